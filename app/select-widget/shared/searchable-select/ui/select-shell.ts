/**
 * Searchable Select DOM Shell
 *
 * Mounts a searchable select into a container and drives it with the core
 * reducer from `searchable-select-shared`:
 * - Value display: selected label, clear button, arrow (click toggles the list)
 * - Dropdown: search input + option list, or the no-match message
 *
 * The shell owns exactly one SelectState. Every user interaction becomes a
 * SelectIntent; the next state comes from `transition` and is re-rendered.
 */

import {
  SelectIntents,
  describeSelect,
  getSelectValue,
  replaceSelectItems,
  transition,
  type SelectIntent,
  type SelectItem,
  type SelectState,
} from 'searchable-select-shared';
import { parseSelectOptions, type SearchableSelectOptions } from '@/common/select-options';
import { Disposer } from '@/shared/utils/disposables';
import {
  ARROW_GLYPHS,
  SELECT_CLASS_NAMES,
  arrowClassName,
  isConfirmKey,
} from './presentation';

// ============================================================
// Types
// ============================================================

export interface SearchableSelectShellOptions<T> {
  /** Element the widget is appended to */
  container: HTMLElement;
  /** State to start from (see initSelectState / emptySelectState) */
  initialState: SelectState<T>;
  /** Presentation options, validated on mount */
  options?: SearchableSelectOptions;
  /** Called after an intent changed the selected item */
  onChange?: (value: T | null, state: SelectState<T>) => void;
}

export interface SearchableSelectShellManager<T> {
  /** Root element of the widget */
  readonly element: HTMLElement;
  getState: () => SelectState<T>;
  /** Payload of the current selection */
  getValue: () => T | null;
  /** Apply an intent and re-render */
  dispatch: (intent: SelectIntent<T>) => void;
  /** Swap the catalog, keeping the current search text applied */
  replaceItems: (items: readonly SelectItem<T>[], selection: SelectItem<T> | null) => void;
  focusInput: () => void;
  dispose: () => void;
}

const LOG_PREFIX = '[SearchableSelect]';

// ============================================================
// Main Factory
// ============================================================

/**
 * Mount a searchable select.
 *
 * @example
 * ```typescript
 * const select = mountSearchableSelect({
 *   container: currencyField,
 *   initialState: initSelectState(
 *     [{ label: 'Euro', payload: 'EUR' }, { label: 'US Dollar', payload: 'USD' }],
 *     null,
 *   ),
 *   options: { placeholder: 'Find a currency' },
 *   onChange: (code) => saveCurrency(code),
 * });
 * ```
 */
export function mountSearchableSelect<T>(
  shellOptions: SearchableSelectShellOptions<T>,
): SearchableSelectShellManager<T> {
  const config = parseSelectOptions(shellOptions.options);
  const disposer = new Disposer();
  const { container } = shellOptions;

  let disposed = false;
  let state = shellOptions.initialState;

  // --------------------------------------------------------
  // DOM Setup
  // --------------------------------------------------------

  const root = document.createElement('div');
  root.className = SELECT_CLASS_NAMES.root;
  container.append(root);
  disposer.add(() => root.remove());

  // Value display (toggle affordance)
  const valueEl = document.createElement('div');
  valueEl.className = SELECT_CLASS_NAMES.value;

  const valueTextEl = document.createElement('span');
  valueTextEl.className = SELECT_CLASS_NAMES.valueText;

  const clearBtn = document.createElement('button');
  clearBtn.type = 'button';
  clearBtn.className = SELECT_CLASS_NAMES.clear;
  clearBtn.textContent = config.clearText;

  const arrowEl = document.createElement('span');

  valueEl.append(valueTextEl, clearBtn, arrowEl);

  // Dropdown
  const dropdown = document.createElement('div');
  dropdown.className = SELECT_CLASS_NAMES.dropdown;

  const input = document.createElement('input');
  input.type = 'text';
  input.className = SELECT_CLASS_NAMES.search;
  input.placeholder = config.placeholder;
  input.setAttribute('autocomplete', 'off');

  const list = document.createElement('div');
  list.className = SELECT_CLASS_NAMES.list;

  const noMatchEl = document.createElement('div');
  noMatchEl.className = SELECT_CLASS_NAMES.noMatch;
  noMatchEl.textContent = config.noMatchText;

  dropdown.append(input, list, noMatchEl);
  root.append(valueEl, dropdown);

  // --------------------------------------------------------
  // Event Handlers
  // --------------------------------------------------------

  function handleToggleClick(e: MouseEvent): void {
    e.preventDefault();
    e.stopPropagation();
    dispatch(SelectIntents.toggleOpen());
  }

  function handleClearClick(e: MouseEvent): void {
    // Clear sits inside the value display; it must not toggle the list too
    e.preventDefault();
    e.stopPropagation();
    dispatch(SelectIntents.clear());
  }

  function handleInput(): void {
    dispatch(SelectIntents.search(input.value));
  }

  function handleKeyDown(e: KeyboardEvent): void {
    if (!isConfirmKey(e)) return;
    e.preventDefault();
    dispatch(SelectIntents.confirmSearch());
  }

  disposer.listen(valueEl, 'click', handleToggleClick);
  disposer.listen(clearBtn, 'click', handleClearClick);
  disposer.listen(input, 'input', handleInput);
  disposer.listen(input, 'keydown', handleKeyDown);

  // --------------------------------------------------------
  // Rendering
  // --------------------------------------------------------

  function render(): void {
    if (disposed) return;

    const view = describeSelect(state);

    root.classList.toggle(SELECT_CLASS_NAMES.open, view.open);
    valueTextEl.textContent = view.selectedLabel;
    clearBtn.hidden = !view.showClear;
    arrowEl.className = `${SELECT_CLASS_NAMES.arrow} ${arrowClassName(view.arrow)}`;
    arrowEl.textContent = ARROW_GLYPHS[view.arrow];

    dropdown.hidden = !view.open;
    // Only touch the input when the state disagrees, so the caret is kept while typing
    if (input.value !== view.searchValue) {
      input.value = view.searchValue;
    }

    list.innerHTML = '';
    for (const row of view.rows) {
      list.append(renderOption(row.item, row.selected));
    }
    noMatchEl.hidden = !view.showNoMatch;
  }

  function renderOption(item: SelectItem<T>, isSelected: boolean): HTMLDivElement {
    const option = document.createElement('div');
    option.className = SELECT_CLASS_NAMES.option;
    option.classList.toggle(SELECT_CLASS_NAMES.optionSelected, isSelected);
    option.dataset.selected = String(isSelected);
    option.textContent = item.label;

    // Listeners die with the element on the next render
    option.addEventListener('click', () => {
      dispatch(SelectIntents.select(item));
    });

    return option;
  }

  // --------------------------------------------------------
  // State Updates
  // --------------------------------------------------------

  function commit(next: SelectState<T>): void {
    const prev = state;
    const wasOpen = prev.isOpen;
    state = next;
    render();

    if (next.isOpen && !wasOpen && config.autoFocus) {
      input.focus();
    }

    if (next.value !== prev.value) {
      notifyChange();
    }
  }

  function notifyChange(): void {
    if (!shellOptions.onChange) return;
    try {
      shellOptions.onChange(getSelectValue(state), state);
    } catch (err) {
      console.warn(`${LOG_PREFIX} onChange handler error:`, err);
    }
  }

  // --------------------------------------------------------
  // Public API
  // --------------------------------------------------------

  function dispatch(intent: SelectIntent<T>): void {
    if (disposed) return;
    commit(transition(intent, state));
  }

  function replaceItems(items: readonly SelectItem<T>[], selection: SelectItem<T> | null): void {
    if (disposed) return;
    commit(replaceSelectItems(state, items, selection));
  }

  function getState(): SelectState<T> {
    return state;
  }

  function getValue(): T | null {
    return getSelectValue(state);
  }

  function focusInput(): void {
    if (disposed) return;
    input.focus();
  }

  function dispose(): void {
    if (disposed) return;
    disposed = true;
    disposer.dispose();
  }

  render();

  return {
    element: root,
    getState,
    getValue,
    dispatch,
    replaceItems,
    focusInput,
    dispose,
  };
}
