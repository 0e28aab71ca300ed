/**
 * Searchable Select presentation constants
 *
 * Class names, glyphs and key handling shared by the DOM and Vue shells.
 */

import type { SelectArrow } from 'searchable-select-shared';

export const SELECT_CLASS_NAMES = {
  root: 'ss-select',
  open: 'ss-open',
  value: 'ss-value',
  valueText: 'ss-value-text',
  clear: 'ss-clear',
  arrow: 'ss-arrow',
  dropdown: 'ss-dropdown',
  search: 'ss-search',
  list: 'ss-list',
  option: 'ss-option',
  optionSelected: 'ss-option-selected',
  noMatch: 'ss-no-match',
} as const;

export const ARROW_GLYPHS: Record<SelectArrow, string> = {
  up: '▲', // Black up-pointing triangle
  down: '▼', // Black down-pointing triangle
};

export function arrowClassName(arrow: SelectArrow): string {
  return `${SELECT_CLASS_NAMES.arrow}-${arrow}`;
}

/** Legacy keyCode for Enter; some hosts only populate keyCode */
export const ENTER_KEY_CODE = 13;

/**
 * Whether a keydown should confirm the current search.
 * Ignored during IME composition (e.g., CJK input).
 */
export function isConfirmKey(event: KeyboardEvent): boolean {
  if (event.isComposing) return false;
  return event.key === 'Enter' || event.keyCode === ENTER_KEY_CODE;
}
