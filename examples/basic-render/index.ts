/**
 * Basic Render Example
 *
 * Renders a handful of pages concurrently inside one render scope.
 * This example shows:
 * - One scratch store per page and one for the site
 * - Counting and concatenating with add
 * - Building a table of contents with setInMap / getSortedMapValues
 * - Template-style calls through bound methods
 */

import { ArithmeticError, bindScratchMethods, withRenderScope } from '../../src/index.js';
import type { RenderScope } from '../../src/index.js';

interface Page {
  readonly path: string;
  readonly title: string;
  readonly words: readonly string[];
}

const site = { title: 'Field Notes' };

const pages: Page[] = [
  { path: '/posts/tides', title: 'Tides', words: ['moon', 'water', 'pull'] },
  { path: '/about', title: 'About', words: ['hello'] },
  { path: '/posts/ferns', title: 'Ferns', words: ['spore', 'frond'] },
];

async function renderPage(scope: RenderScope, page: Page): Promise<string> {
  const scratch = scope.storeFor(page);
  const siteScratch = bindScratchMethods(scope.storeFor(site));

  for (const word of page.words) {
    scratch.add('wordCount', 1);
    scratch.add('keywords', [word]);
  }

  // Let other pages interleave, as an engine awaiting partials would
  await new Promise((resolve) => setImmediate(resolve));

  siteScratch.add('totalWords', page.words.length);
  siteScratch.setInMap('toc', page.path, page.title);

  return `${page.title}: ${String(scratch.get('wordCount'))} words [${String(scratch.get('keywords'))}]`;
}

async function main(): Promise<void> {
  try {
    await withRenderScope(async (scope) => {
      const rendered = await Promise.all(pages.map((page) => renderPage(scope, page)));
      rendered.forEach((line) => console.log(line));

      const siteScratch = scope.storeFor(site);
      console.log(`\nTotal words: ${String(siteScratch.get('totalWords'))}`);
      console.log(`Contents: ${JSON.stringify(siteScratch.getSortedMapValues('toc'))}`);

      try {
        siteScratch.add('totalWords', 'many');
      } catch (error) {
        if (error instanceof ArithmeticError) {
          console.log(`\nRejected: ${error.message}`);
        } else {
          throw error;
        }
      }

      console.log(`Scope stats: ${JSON.stringify(scope.getStats())}`);
    });
  } catch (error) {
    console.error('Error running example:', error);
    process.exit(1);
  }
}

void main();
