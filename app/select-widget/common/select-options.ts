/**
 * Searchable Select Options
 *
 * Presentation options shared by the DOM shell and the Vue shell.
 * Raw input is validated with a strict zod schema; defaults are filled in.
 */

import { z } from 'zod';

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_PLACEHOLDER = 'Search...';
export const DEFAULT_NO_MATCH_TEXT = 'No match found';
export const DEFAULT_CLEAR_TEXT = '×'; // Multiplication sign

// =============================================================================
// Schema
// =============================================================================

export const SelectOptionsSchema = z
  .object({
    /** Placeholder of the search input */
    placeholder: z.string().default(DEFAULT_PLACEHOLDER),
    /** Message shown when a search matches nothing */
    noMatchText: z.string().min(1, 'must not be empty').default(DEFAULT_NO_MATCH_TEXT),
    /** Content of the clear button */
    clearText: z.string().min(1, 'must not be empty').default(DEFAULT_CLEAR_TEXT),
    /** Focus the search input when the list opens */
    autoFocus: z.boolean().default(true),
  })
  .strict();

/** Options as callers pass them (every field optional) */
export type SearchableSelectOptions = z.input<typeof SelectOptionsSchema>;

/** Options after validation, with defaults applied */
export type SearchableSelectConfig = z.output<typeof SelectOptionsSchema>;

// =============================================================================
// Errors
// =============================================================================

/**
 * Thrown when shell options fail validation.
 * `issues` holds one "<path>: <message>" entry per problem.
 */
export class SearchableSelectOptionsError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid searchable select options: ${issues.join('; ')}`);
    this.name = 'SearchableSelectOptionsError';
    this.issues = issues;
  }
}

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

// =============================================================================
// Public API
// =============================================================================

export function parseSelectOptions(raw: unknown = {}): SearchableSelectConfig {
  const parsed = SelectOptionsSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new SearchableSelectOptionsError(parsed.error.issues.map(formatIssue));
  }
  return parsed.data;
}
