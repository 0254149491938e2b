import { defaultLogger } from './core';
import { Entry } from './entry';

const entryKey: unique symbol = Symbol('cloud-slog.entry');

/** A context object carrying an entry. */
export type EntryContext<T extends object> = T & { readonly [entryKey]: Entry };

/**
 * Derive a context from `ctx` that carries `entry`. The result inherits from `ctx`,
 * so its fields, getters and methods stay reachable; `ctx` itself is left as is.
 */
export function withContext<T extends object>(ctx: T, entry: Entry): EntryContext<T> {
  const derived: EntryContext<T> = Object.create(ctx, { [entryKey]: { value: entry } });
  return derived;
}

/** The entry carried by `ctx`, or a new entry of the default logger if there is none. */
export function fromContext(ctx: object): Entry {
  if (entryKey in ctx) {
    const entry = ctx[entryKey];
    if (entry instanceof Entry) return entry;
  }
  return defaultLogger().newEntry();
}
