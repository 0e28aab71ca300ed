// select-intents.ts — creators for every SelectIntent variant
// Payload-free intents carry no type parameter so they fit any SelectState<T>.

import {
  SELECT_INTENT_TYPES,
  type ClearIntent,
  type ConfirmSearchIntent,
  type ReplaceItemsIntent,
  type SearchIntent,
  type SelectItem,
  type SelectItemIntent,
  type ToggleOpenIntent,
} from './select-types';

export const SelectIntents = {
  toggleOpen(): ToggleOpenIntent {
    return { type: SELECT_INTENT_TYPES.TOGGLE_OPEN };
  },
  select<T>(item: SelectItem<T>): SelectItemIntent<T> {
    return { type: SELECT_INTENT_TYPES.SELECT, item };
  },
  clear(): ClearIntent {
    return { type: SELECT_INTENT_TYPES.CLEAR };
  },
  search(text: string): SearchIntent {
    return { type: SELECT_INTENT_TYPES.SEARCH, text };
  },
  confirmSearch(): ConfirmSearchIntent {
    return { type: SELECT_INTENT_TYPES.CONFIRM_SEARCH };
  },
  replaceItems<T>(
    items: readonly SelectItem<T>[],
    selection: SelectItem<T> | null,
  ): ReplaceItemsIntent<T> {
    return { type: SELECT_INTENT_TYPES.REPLACE_ITEMS, items, selection };
  },
};
