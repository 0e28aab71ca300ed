// select-state.ts — constructors and queries over SelectState

import { SelectIntents } from './select-intents';
import { transition } from './select-transition';
import type { SelectItem, SelectState } from './select-types';

/**
 * Build a clearable state over `items`.
 * `defaultValue` is trusted as given: it is not checked against `items`, and a
 * value missing from the catalog simply never renders as a selected row.
 */
export function initSelectState<T>(
  items: readonly SelectItem<T>[],
  defaultValue: SelectItem<T> | null = null,
): SelectState<T> {
  return {
    items,
    visibleItems: items,
    value: defaultValue,
    isOpen: false,
    searchValue: '',
    canClear: true,
  };
}

/** Zero state: no catalog, no selection, clearing disabled. */
export function emptySelectState<T>(): SelectState<T> {
  return {
    items: [],
    visibleItems: [],
    value: null,
    isOpen: false,
    searchValue: '',
    canClear: false,
  };
}

export function getSelectValue<T>(state: SelectState<T>): T | null {
  return state.value ? state.value.payload : null;
}

/**
 * Swap the catalog mid-session. The current search text is re-applied to the
 * new items so `visibleItems` stays consistent with it.
 */
export function replaceSelectItems<T>(
  state: SelectState<T>,
  items: readonly SelectItem<T>[],
  selection: SelectItem<T> | null,
): SelectState<T> {
  return transition(SelectIntents.replaceItems(items, selection), state);
}
