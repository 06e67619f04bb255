/**
 * Render Scope for Rendermark
 *
 * One scope lives for exactly one rendering pass. It hands each owner (a page,
 * a section, the site) its own scratch store and forgets them all on close.
 * Scopes are passed to whatever renders; there is no process-wide store.
 */

import { randomUUID } from 'crypto';
import { ScopeClosedError } from '../core/errors/scratch-error.js';
import { createModuleLogger } from '../core/logging/logger.js';
import type { Logger } from '../core/logging/logger.js';
import { createScratchStore } from '../scratch/scratch-store.js';
import type { ScratchStore } from '../scratch/scratch-store.js';

export interface RenderScopeOptions {
  /** Identifier used in logs and errors (default: random UUID) */
  readonly id?: string;
  readonly logger?: Logger;
}

export interface RenderScopeStats {
  readonly id: string;
  /** Stores handed out to owners */
  readonly ownedStores: number;
  /** Stores created without an owner */
  readonly detachedStores: number;
  readonly closed: boolean;
}

export class RenderScope {
  readonly id: string;
  private readonly logger: Logger;
  private stores = new WeakMap<object, ScratchStore>();
  private ownedStores = 0;
  private detachedStores = 0;
  private closed = false;

  constructor(options: RenderScopeOptions = {}) {
    this.id = options.id ?? randomUUID();
    this.logger = createModuleLogger('render-scope', options.logger).child({ scope: this.id });
    this.logger.debug('render scope opened');
  }

  /**
   * The store belonging to owner, created on first request
   */
  storeFor(owner: object): ScratchStore {
    this.assertOpen();

    const existing = this.stores.get(owner);
    if (existing !== undefined) {
      return existing;
    }

    const store = createScratchStore();
    this.stores.set(owner, store);
    this.ownedStores += 1;
    return store;
  }

  /**
   * A fresh store nobody else can reach, for templates that want private scratch space
   */
  createStore(): ScratchStore {
    this.assertOpen();
    this.detachedStores += 1;
    return createScratchStore();
  }

  hasStore(owner: object): boolean {
    return !this.closed && this.stores.has(owner);
  }

  /**
   * End the pass. Stores already handed out stay usable by their holders, but
   * the scope no longer tracks them. Closing twice is a no-op.
   */
  close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.stores = new WeakMap();
    this.logger.debug(
      { ownedStores: this.ownedStores, detachedStores: this.detachedStores },
      'render scope closed'
    );
  }

  get isClosed(): boolean {
    return this.closed;
  }

  getStats(): RenderScopeStats {
    return {
      id: this.id,
      ownedStores: this.ownedStores,
      detachedStores: this.detachedStores,
      closed: this.closed,
    };
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ScopeClosedError(this.id);
    }
  }
}

/**
 * Create a render scope for one rendering pass
 */
export function createRenderScope(options?: RenderScopeOptions): RenderScope {
  return new RenderScope(options);
}

/**
 * Run render inside a fresh scope, closing it once the returned promise settles
 */
export async function withRenderScope<T>(
  render: (scope: RenderScope) => Promise<T>,
  options?: RenderScopeOptions
): Promise<T> {
  const scope = createRenderScope(options);
  try {
    return await render(scope);
  } finally {
    scope.close();
  }
}
