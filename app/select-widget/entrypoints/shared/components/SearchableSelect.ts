/**
 * Searchable Select (Vue)
 *
 * `renderSearchableSelect` is the declarative counterpart of the DOM shell: a
 * pure function from SelectState to a VNode tree. `SearchableSelect` wraps it
 * in a controlled component that emits `update:state` with the next state, so
 * the caller keeps ownership of the state (`v-model:state`).
 */
import {
  computed,
  defineComponent,
  h,
  ref,
  watch,
  type Ref,
  type SetupContext,
  type VNode,
} from 'vue';
import {
  SelectIntents,
  describeSelect,
  transition,
  type SelectIntent,
  type SelectItem,
  type SelectState,
} from 'searchable-select-shared';
import {
  parseSelectOptions,
  type SearchableSelectConfig,
  type SearchableSelectOptions,
} from '@/common/select-options';
import {
  ARROW_GLYPHS,
  SELECT_CLASS_NAMES,
  arrowClassName,
  isConfirmKey,
} from '@/shared/searchable-select/ui/presentation';

// =============================================================================
// Render Function
// =============================================================================

export type SelectDispatch<T> = (intent: SelectIntent<T>) => void;

export interface SearchableSelectRenderRefs {
  /** Bound to the search input element */
  input?: Ref<HTMLInputElement | null>;
}

export function renderSearchableSelect<T>(
  state: SelectState<T>,
  dispatch: SelectDispatch<T>,
  config: SearchableSelectConfig,
  refs: SearchableSelectRenderRefs = {},
): VNode {
  const view = describeSelect(state);

  const onToggleClick = (e: MouseEvent) => {
    e.preventDefault();
    e.stopPropagation();
    dispatch(SelectIntents.toggleOpen());
  };

  const onClearClick = (e: MouseEvent) => {
    e.preventDefault();
    e.stopPropagation();
    dispatch(SelectIntents.clear());
  };

  const onInput = (e: Event) => {
    if (e.target instanceof HTMLInputElement) {
      dispatch(SelectIntents.search(e.target.value));
    }
  };

  const onKeydown = (e: KeyboardEvent) => {
    if (!isConfirmKey(e)) return;
    e.preventDefault();
    dispatch(SelectIntents.confirmSearch());
  };

  const renderOption = (item: SelectItem<T>, selected: boolean, index: number): VNode =>
    h(
      'div',
      {
        key: `${index}:${item.label}`,
        class: [SELECT_CLASS_NAMES.option, { [SELECT_CLASS_NAMES.optionSelected]: selected }],
        'data-selected': String(selected),
        onClick: () => dispatch(SelectIntents.select(item)),
      },
      item.label,
    );

  return h('div', { class: [SELECT_CLASS_NAMES.root, { [SELECT_CLASS_NAMES.open]: view.open }] }, [
    h('div', { class: SELECT_CLASS_NAMES.value, onClick: onToggleClick }, [
      h('span', { class: SELECT_CLASS_NAMES.valueText }, view.selectedLabel),
      view.showClear
        ? h(
            'button',
            { type: 'button', class: SELECT_CLASS_NAMES.clear, onClick: onClearClick },
            config.clearText,
          )
        : null,
      h(
        'span',
        { class: [SELECT_CLASS_NAMES.arrow, arrowClassName(view.arrow)] },
        ARROW_GLYPHS[view.arrow],
      ),
    ]),
    h('div', { class: SELECT_CLASS_NAMES.dropdown, hidden: !view.open }, [
      h('input', {
        ref: refs.input,
        type: 'text',
        class: SELECT_CLASS_NAMES.search,
        autocomplete: 'off',
        placeholder: config.placeholder,
        value: view.searchValue,
        onInput,
        onKeydown,
      }),
      h(
        'div',
        { class: SELECT_CLASS_NAMES.list },
        view.rows.map((row, index) => renderOption(row.item, row.selected, index)),
      ),
      view.showNoMatch ? h('div', { class: SELECT_CLASS_NAMES.noMatch }, config.noMatchText) : null,
    ]),
  ]);
}

// =============================================================================
// Component
// =============================================================================

export interface SearchableSelectProps<T = unknown> {
  state: SelectState<T>;
  options?: SearchableSelectOptions;
}

export const SearchableSelect = defineComponent(
  <T>(props: SearchableSelectProps<T>, { emit }: SetupContext<['update:state']>) => {
    const config = computed(() => parseSelectOptions(props.options));
    const inputRef = ref<HTMLInputElement | null>(null);

    function dispatch(intent: SelectIntent<T>): void {
      emit('update:state', transition(intent, props.state));
    }

    // Focus after the DOM shows the dropdown
    watch(
      () => props.state.isOpen,
      (open, wasOpen) => {
        if (!open || wasOpen || !config.value.autoFocus) return;
        inputRef.value?.focus();
      },
      { flush: 'post' },
    );

    return () => renderSearchableSelect(props.state, dispatch, config.value, { input: inputRef });
  },
  {
    name: 'SearchableSelect',
    props: ['state', 'options'],
    emits: ['update:state'],
  },
);
