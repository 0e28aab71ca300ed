// select-view.ts — headless render: what a presentation layer should show
// Shells draw from this description and never derive visibility rules themselves.

import type { SelectState, SelectView } from './select-types';

export function selectedLabelOf<T>(state: SelectState<T>): string {
  return state.value ? state.value.label : '';
}

// Clear is offered only when clearing is allowed and a non-empty label is selected
export function canShowClear<T>(state: SelectState<T>): boolean {
  return state.canClear && selectedLabelOf(state) !== '';
}

export function describeSelect<T>(state: SelectState<T>): SelectView<T> {
  const selectedLabel = selectedLabelOf(state);
  const hasValue = state.value !== null;

  return {
    open: state.isOpen,
    arrow: state.isOpen ? 'up' : 'down',
    selectedLabel,
    showClear: canShowClear(state),
    searchValue: state.searchValue,
    rows: state.visibleItems.map((item) => ({
      item,
      selected: hasValue && item.label === selectedLabel,
    })),
    showNoMatch: state.visibleItems.length === 0 && state.searchValue !== '',
  };
}
