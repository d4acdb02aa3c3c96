import type { Filter } from './types.js';

export const ALL: Filter = { kind: 'all' };

/**
 * Parse a comma-separated CLI list into a filter.
 * A missing argument, an empty string and "." all select everything.
 */
export function parseFilter(arg: string | undefined): Filter {
  if (arg === undefined || arg === '' || arg === '.') {
    return ALL;
  }

  const items = arg.split(',').filter((item) => item !== '');
  if (items.length === 0) {
    return ALL;
  }

  return { kind: 'subset', items: new Set(items) };
}

/**
 * Exact string membership; no prefix or glob matching
 */
export function shouldUpdate(item: string, filter: Filter): boolean {
  if (filter.kind === 'all') {
    return true;
  }
  return filter.items.has(item);
}
