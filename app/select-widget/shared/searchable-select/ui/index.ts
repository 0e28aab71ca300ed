/**
 * Searchable Select UI Module Index
 */

// ============================================================
// DOM shell
// ============================================================

export {
  mountSearchableSelect,
  type SearchableSelectShellManager,
  type SearchableSelectShellOptions,
} from './select-shell';

// ============================================================
// Presentation constants
// ============================================================

export {
  ARROW_GLYPHS,
  ENTER_KEY_CODE,
  SELECT_CLASS_NAMES,
  arrowClassName,
  isConfirmKey,
} from './presentation';
