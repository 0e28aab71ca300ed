/**
 * Searchable Select Composables
 */
export { useSearchableSelect } from './useSearchableSelect';

export type { UseSearchableSelect, UseSearchableSelectOptions } from './useSearchableSelect';
