/**
 * Composable holding one searchable select state.
 *
 * Pair it with the SearchableSelect component:
 *   <SearchableSelect v-model:state="select.state.value" />
 */
import { computed, shallowRef, type ComputedRef, type ShallowRef } from 'vue';
import {
  emptySelectState,
  getSelectValue,
  initSelectState,
  replaceSelectItems,
  transition,
  type SelectIntent,
  type SelectItem,
  type SelectState,
} from 'searchable-select-shared';

export interface UseSearchableSelectOptions<T> {
  /**
   * Catalog to start with. When omitted the state starts empty and the clear
   * button is never offered.
   */
  items?: readonly SelectItem<T>[];
  /** Initial selection; only used together with `items` */
  defaultValue?: SelectItem<T> | null;
}

export interface UseSearchableSelect<T> {
  state: ShallowRef<SelectState<T>>;
  /** Payload of the current selection */
  value: ComputedRef<T | null>;
  dispatch: (intent: SelectIntent<T>) => void;
  replaceItems: (items: readonly SelectItem<T>[], selection: SelectItem<T> | null) => void;
  setState: (next: SelectState<T>) => void;
}

export function useSearchableSelect<T>(
  options: UseSearchableSelectOptions<T> = {},
): UseSearchableSelect<T> {
  const state = shallowRef<SelectState<T>>(
    options.items
      ? initSelectState(options.items, options.defaultValue ?? null)
      : emptySelectState<T>(),
  );

  const value = computed<T | null>(() => getSelectValue(state.value));

  function dispatch(intent: SelectIntent<T>): void {
    state.value = transition(intent, state.value);
  }

  function replaceItems(items: readonly SelectItem<T>[], selection: SelectItem<T> | null): void {
    state.value = replaceSelectItems(state.value, items, selection);
  }

  function setState(next: SelectState<T>): void {
    state.value = next;
  }

  return { state, value, dispatch, replaceItems, setState };
}
