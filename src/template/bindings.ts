/**
 * Template Bindings for Rendermark Scratch
 *
 * Template engines call functions with whatever the template author wrote.
 * Arguments are checked before they reach the store; anything other than a
 * string key or a plain value throws ScratchArgumentError.
 *
 * Write methods return undefined; nothing is printed where they are called.
 */

import type { z } from 'zod';
import { ScratchArgumentError } from '../core/errors/scratch-error.js';
import { createModuleLogger } from '../core/logging/logger.js';
import type { Logger } from '../core/logging/logger.js';
import type { PlainValue } from '../core/types/value.js';
import type { ScratchStore } from '../scratch/scratch-store.js';
import { ScratchArgs } from './schema.js';
import type { ScratchMethodName } from './schema.js';

export type ScratchMethod = (...args: readonly unknown[]) => PlainValue | undefined;

export type ScratchMethods = Readonly<Record<ScratchMethodName, ScratchMethod>>;

export interface BindingOptions {
  readonly logger?: Logger;
}

function formatIssue(issue: z.ZodIssue): string {
  const [position, ...rest] = issue.path;
  if (position === undefined) {
    return issue.message;
  }

  const location = [`argument ${Number(position) + 1}`, ...rest].join('.');
  return `${location}: ${issue.message}`;
}

/**
 * Expose a store's operations as untyped template functions
 */
export function bindScratchMethods(store: ScratchStore, options: BindingOptions = {}): ScratchMethods {
  const logger = createModuleLogger('template-bindings', options.logger);

  function parse<T>(
    method: ScratchMethodName,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    args: readonly unknown[]
  ): T {
    const parsed = schema.safeParse(args);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(formatIssue);
      logger.warn({ method, issues }, 'rejected scratch call');
      throw new ScratchArgumentError(method, issues);
    }
    return parsed.data;
  }

  return Object.freeze({
    add: (...args: readonly unknown[]): undefined => {
      const [key, addend] = parse('add', ScratchArgs.add, args);
      store.add(key, addend);
      return undefined;
    },
    set: (...args: readonly unknown[]): undefined => {
      const [key, value] = parse('set', ScratchArgs.set, args);
      store.set(key, value);
      return undefined;
    },
    get: (...args: readonly unknown[]): PlainValue | undefined => {
      const [key] = parse('get', ScratchArgs.get, args);
      return store.get(key);
    },
    setInMap: (...args: readonly unknown[]): undefined => {
      const [key, mapKey, value] = parse('setInMap', ScratchArgs.setInMap, args);
      store.setInMap(key, mapKey, value);
      return undefined;
    },
    getSortedMapValues: (...args: readonly unknown[]): PlainValue | undefined => {
      const [key] = parse('getSortedMapValues', ScratchArgs.getSortedMapValues, args);
      return store.getSortedMapValues(key);
    },
    delete: (...args: readonly unknown[]): undefined => {
      const [key] = parse('delete', ScratchArgs.delete, args);
      store.delete(key);
      return undefined;
    },
    deleteInMap: (...args: readonly unknown[]): undefined => {
      const [key, mapKey] = parse('deleteInMap', ScratchArgs.deleteInMap, args);
      store.deleteInMap(key, mapKey);
      return undefined;
    },
    values: (...args: readonly unknown[]): PlainValue => {
      parse('values', ScratchArgs.values, args);
      return store.values();
    },
  });
}
