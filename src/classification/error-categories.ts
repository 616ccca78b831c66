export type ErrorCategory =
  | "multihash_not_found"
  | "root_load_failure"
  | "piece_not_found"
  | "cid_not_found"
  | "timeout"
  | "connection_error"
  | "ipld_error"
  | "node_not_found"
  | "other";

export interface ErrorCategoryRule {
  category: Exclude<ErrorCategory, "other">;
  /** Lower-case substrings that must all be present. */
  allOf: readonly string[];
}

/**
 * Evaluated top to bottom; the first matching rule wins.
 */
export const ERROR_CATEGORY_RULES: readonly ErrorCategoryRule[] = [
  { category: "multihash_not_found", allOf: ["multihash", "not found"] },
  { category: "root_load_failure", allOf: ["failed to load root"] },
  { category: "piece_not_found", allOf: ["piece", "not found"] },
  { category: "cid_not_found", allOf: ["cid", "not found"] },
  { category: "timeout", allOf: ["timeout"] },
  { category: "connection_error", allOf: ["connection"] },
  { category: "ipld_error", allOf: ["ipld"] },
  { category: "node_not_found", allOf: ["could not find node"] },
];

export const FALLBACK_ERROR_CATEGORY = "other" satisfies ErrorCategory;

export function categorizeError(
  text: string | null | undefined,
  rules: readonly ErrorCategoryRule[] = ERROR_CATEGORY_RULES,
): ErrorCategory {
  if (!text) {
    return FALLBACK_ERROR_CATEGORY;
  }
  const haystack = text.toLowerCase();
  const match = rules.find((rule) => rule.allOf.every((needle) => haystack.includes(needle)));
  return match?.category ?? FALLBACK_ERROR_CATEGORY;
}

/**
 * Text a failed check is categorized by: response body then error message.
 */
export function failureText(responseBody: string | null | undefined, errorMessage: string | null | undefined): string {
  return `${responseBody ?? ""} ${errorMessage ?? ""}`.trim();
}

export const EMPTY_ERROR_PATTERN = "<no response body>";

const PATTERN_REPLACEMENTS: ReadonlyArray<[RegExp, string]> = [
  [/baf[a-z0-9]{50,}/g, "<CID>"],
  [/multihash [a-f0-9]{64,}:/g, "multihash <HASH>:"],
  [/baga6ea4seaq[a-z0-9]{50,}/g, "<PIECE_CID>"],
  [/deal \d+/g, "deal <ID>"],
  [/[a-f0-9]{32,}/g, "<HASH>"],
];

/**
 * Replaces identifiers and hashes with placeholders so errors that differ only
 * by the object involved group together.
 */
export function normalizeErrorPattern(text: string | null | undefined): string {
  if (!text) {
    return EMPTY_ERROR_PATTERN;
  }
  let pattern = text;
  for (const [expression, placeholder] of PATTERN_REPLACEMENTS) {
    pattern = pattern.replace(expression, placeholder);
  }
  pattern = pattern.trim();
  return pattern.length > 0 ? pattern : EMPTY_ERROR_PATTERN;
}
