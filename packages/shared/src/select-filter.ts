// select-filter.ts — case-insensitive substring filter over item labels
// Plain lowercase fold, no locale collation; result keeps catalog order.

import type { SelectItem } from './select-types';

export function labelMatches(label: string, query: string): boolean {
  return label.toLowerCase().includes(query.toLowerCase());
}

export function filterSelectItems<T>(
  items: readonly SelectItem<T>[],
  query: string,
): readonly SelectItem<T>[] {
  if (query === '') return items;
  return items.filter((item) => labelMatches(item.label, query));
}
