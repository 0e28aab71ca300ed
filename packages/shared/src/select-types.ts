// select-types.ts — data model for the searchable select core
// Payloads are opaque to the core; labels are the only thing it reads.

export interface SelectItem<T> {
  readonly label: string;
  readonly payload: T;
}

export interface SelectState<T> {
  /** Full catalog, in caller order */
  readonly items: readonly SelectItem<T>[];
  /** `items` filtered by `searchValue`; never edited on its own */
  readonly visibleItems: readonly SelectItem<T>[];
  /** Current selection, null when nothing is selected */
  readonly value: SelectItem<T> | null;
  readonly isOpen: boolean;
  /** Current search text; '' means no filter */
  readonly searchValue: string;
  /** Fixed at construction */
  readonly canClear: boolean;
}

// Intent type strings, kept in one place to avoid magic literals
export const SELECT_INTENT_TYPES = {
  TOGGLE_OPEN: 'toggleOpen',
  SELECT: 'select',
  CLEAR: 'clear',
  SEARCH: 'search',
  CONFIRM_SEARCH: 'confirmSearch',
  REPLACE_ITEMS: 'replaceItems',
} as const;

export interface ToggleOpenIntent {
  readonly type: typeof SELECT_INTENT_TYPES.TOGGLE_OPEN;
}
export interface SelectItemIntent<T> {
  readonly type: typeof SELECT_INTENT_TYPES.SELECT;
  readonly item: SelectItem<T>;
}
export interface ClearIntent {
  readonly type: typeof SELECT_INTENT_TYPES.CLEAR;
}
export interface SearchIntent {
  readonly type: typeof SELECT_INTENT_TYPES.SEARCH;
  readonly text: string;
}
export interface ConfirmSearchIntent {
  readonly type: typeof SELECT_INTENT_TYPES.CONFIRM_SEARCH;
}
export interface ReplaceItemsIntent<T> {
  readonly type: typeof SELECT_INTENT_TYPES.REPLACE_ITEMS;
  readonly items: readonly SelectItem<T>[];
  readonly selection: SelectItem<T> | null;
}

export type SelectIntent<T> =
  | ToggleOpenIntent
  | SelectItemIntent<T>
  | ClearIntent
  | SearchIntent
  | ConfirmSearchIntent
  | ReplaceItemsIntent<T>;

export type SelectArrow = 'up' | 'down';

export interface SelectRowView<T> {
  item: SelectItem<T>;
  /** Label equals the selected label (payload is not compared) */
  selected: boolean;
}

export interface SelectView<T> {
  open: boolean;
  arrow: SelectArrow;
  selectedLabel: string;
  showClear: boolean;
  searchValue: string;
  rows: SelectRowView<T>[];
  /** No visible rows while a search is active */
  showNoMatch: boolean;
}
