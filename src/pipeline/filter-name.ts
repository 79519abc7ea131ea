/**
 * filter-name.ts - Derives an artifact base name from a filter pattern
 *
 * A filter is a regular expression, so its text is full of characters that
 * don't belong in a filename. Common metacharacters become readable words
 * ("^prod-.*" → "start_prod-wildcard"); anything else becomes "_".
 *
 * The replacements are applied in the order listed: ".*" has to become
 * "wildcard" before "." and "*" fall through to the catch-all "_".
 */

/** Pattern that matches every instance */
export const MATCH_ALL_FILTER = ".*";

/** Base name reserved for the match-all filter */
export const MATCH_ALL_NAME = "all_instances";

/** Used when another pattern sanitizes to MATCH_ALL_NAME */
const RESERVED_NAME_SUBSTITUTE = `${MATCH_ALL_NAME}_filter`;

/**
 * Literal substring → word replacements, applied in sequence.
 */
export const METACHARACTER_REPLACEMENTS: ReadonlyArray<readonly [string, string]> = [
  [".*", "wildcard"],
  ["^", "start_"],
  ["$", "end"],
  ["[", "bracket_"],
  ["]", "bracket"],
  ["(", "paren_"],
  [")", "paren"],
  ["|", "or"],
  ["+", "plus"],
  ["?", "question"],
  ["{", "brace_"],
  ["}", "brace"],
  ["\\", "backslash"],
];

let fallbackSequence = 0;

/**
 * Default fallback for patterns that sanitize to an empty string
 * (e.g., "." or "**"). Unique within the process.
 */
export function defaultFallbackName(): string {
  fallbackSequence += 1;
  return `filter_${Date.now()}_${fallbackSequence}`;
}

export interface SanitizeOptions {
  /** Generates the name used when nothing filename-safe is left */
  fallbackName?: () => string;
}

/**
 * Turns a filter pattern into a filesystem-safe base name containing only
 * letters, digits, "_" and "-".
 *
 * Examples:
 *   ".*"          → "all_instances"
 *   "web.*"       → "webwildcard"
 *   "^prod-.*"    → "start_prod-wildcard"
 *   "(web|db)"    → "paren_webordbparen"
 *   "."           → fallback name
 */
export function sanitizeFilterName(
  pattern: string,
  options?: SanitizeOptions
): string {
  if (pattern === MATCH_ALL_FILTER) {
    return MATCH_ALL_NAME;
  }

  let sanitized = pattern;
  for (const [literal, word] of METACHARACTER_REPLACEMENTS) {
    sanitized = sanitized.split(literal).join(word);
  }

  sanitized = sanitized
    .replace(/[^A-Za-z0-9_-]/g, "_")
    .replace(/_+/g, "_")
    .replace(/^_/, "")
    .replace(/_$/, "");

  if (!sanitized) {
    return (options?.fallbackName ?? defaultFallbackName)();
  }

  if (sanitized === MATCH_ALL_NAME) {
    return RESERVED_NAME_SUBSTITUTE;
  }

  return sanitized;
}
