/**
 * Searchable Select Widget
 *
 * Public entry: DOM shell, Vue component/render function/composable and the
 * options layer. The headless core is re-exported from `searchable-select-shared`.
 */

export * from 'searchable-select-shared';

export {
  DEFAULT_CLEAR_TEXT,
  DEFAULT_NO_MATCH_TEXT,
  DEFAULT_PLACEHOLDER,
  SearchableSelectOptionsError,
  SelectOptionsSchema,
  parseSelectOptions,
  type SearchableSelectConfig,
  type SearchableSelectOptions,
} from './common/select-options';

export * from './shared/searchable-select/ui';

export {
  SearchableSelect,
  renderSearchableSelect,
  type SearchableSelectProps,
  type SearchableSelectRenderRefs,
  type SelectDispatch,
} from './entrypoints/shared/components/SearchableSelect';

export * from './entrypoints/shared/composables';
