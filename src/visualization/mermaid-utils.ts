/**
 * mermaid-utils.ts
 * Identifier and label helpers. Pure and deterministic: edges are drawn by
 * re-sanitizing names, so the same input must always map to the same id.
 */

/** Anything other than letters, digits, "_" and "-". */
const NON_ID_CHARS = /[^\p{L}\p{N}_-]/gu;
const UNDERSCORE_RUNS = /_{2,}/g;
const LEADING_DIGIT = /^\p{Nd}/u;

export const DIGIT_PREFIX = 'id_';

/**
 * Turn an arbitrary name into a Mermaid node id.
 *
 *   "web1.example.com" → "web1_example_com"
 *   "1.2.3.4"          → "id_1_2_3_4"
 */
export function sanitizeId(text: string): string {
  let id = text.trim().replace(NON_ID_CHARS, '_').replace(UNDERSCORE_RUNS, '_');
  if (LEADING_DIGIT.test(id)) {
    id = DIGIT_PREFIX + id;
  }
  return id;
}

/** Double quotes would end a quoted Mermaid label; swap them for single quotes. */
export function escapeLabel(text: string): string {
  return text.replace(/"/g, "'");
}
