// Interview Dialogue Engine - Gap Evaluator
// Deterministic keyword gap check.
//
// A keyword is present when its tokens appear in order, joined by any run of
// separators, and bounded on both sides by something that is not a letter or
// a digit. "Redis-cache", "redis_cache" and "redis / cache" all satisfy
// "redis cache"; "categorized" does not satisfy "cat".

/** Characters treated as interchangeable token separators. */
const SEPARATOR_CLASS = "[\\s\\-_/\\\\]";

const SEPARATOR_RUN = new RegExp(`${SEPARATOR_CLASS}+`, "u");

const TOKEN_CHAR = "[\\p{L}\\p{N}]";

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Splits a keyword into its tokens, dropping empty pieces produced by leading,
 * trailing or repeated separators.
 */
export function keywordTokens(keyword: string): string[] {
  return keyword
    .trim()
    .split(SEPARATOR_RUN)
    .filter((token) => token.length > 0);
}

/**
 * Builds the whole-token, case-insensitive matcher for one keyword, or null for a
 * keyword with no tokens.
 */
export function buildKeywordPattern(keyword: string): RegExp | null {
  const tokens = keywordTokens(keyword);
  if (tokens.length === 0) return null;
  const body = tokens.map(escapeRegExp).join(`${SEPARATOR_CLASS}+`);
  return new RegExp(`(?<!${TOKEN_CHAR})${body}(?!${TOKEN_CHAR})`, "iu");
}

/**
 * Returns the required keywords that do not occur in `answer`, in input order.
 * Blank keywords are treated as present. Never throws.
 */
export function missingKeywords(answer: string, required: readonly string[]): string[] {
  if (required.length === 0) return [];
  const missing: string[] = [];
  for (const keyword of required) {
    const pattern = buildKeywordPattern(keyword);
    if (pattern && !pattern.test(answer)) {
      missing.push(keyword);
    }
  }
  return missing;
}
