// select-transition.ts — the reducer: (intent, state) -> next state
// Total and pure: every intent is valid in every state, inputs are never mutated.

import { filterSelectItems } from './select-filter';
import { SelectIntents } from './select-intents';
import { SELECT_INTENT_TYPES, type SelectIntent, type SelectState } from './select-types';

function assertNever(value: never): never {
  throw new Error(`Unhandled select intent: ${JSON.stringify(value)}`);
}

// Collapse the list and drop any active filter
function resetSearch<T>(state: SelectState<T>): SelectState<T> {
  return { ...state, isOpen: false, searchValue: '', visibleItems: state.items };
}

export function transition<T>(intent: SelectIntent<T>, state: SelectState<T>): SelectState<T> {
  switch (intent.type) {
    case SELECT_INTENT_TYPES.TOGGLE_OPEN:
      return { ...state, isOpen: !state.isOpen };

    case SELECT_INTENT_TYPES.SELECT:
      return { ...resetSearch(state), value: intent.item };

    case SELECT_INTENT_TYPES.CLEAR:
      return { ...state, value: null };

    case SELECT_INTENT_TYPES.SEARCH:
      return {
        ...state,
        searchValue: intent.text,
        visibleItems: filterSelectItems(state.items, intent.text),
      };

    case SELECT_INTENT_TYPES.CONFIRM_SEARCH: {
      // Top of the filtered list, not of the full catalog
      const first = state.visibleItems.length > 0 ? state.visibleItems[0] : undefined;
      return { ...resetSearch(state), value: first ?? state.value };
    }

    case SELECT_INTENT_TYPES.REPLACE_ITEMS: {
      const replaced: SelectState<T> = { ...state, items: intent.items, value: intent.selection };
      return transition(SelectIntents.search(state.searchValue), replaced);
    }

    default:
      return assertNever(intent);
  }
}
