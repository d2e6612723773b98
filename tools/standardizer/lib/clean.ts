const URL_PATTERN = /http\S+|www\.\S+/gi;
const BR_PATTERN = /<br\s*\/?>/gi;
const WHITESPACE_PATTERN = /\s+/g;

/** Conservative cleanup ahead of tokenization. */
export function basicClean(text: string): string {
  return text
    .replace(BR_PATTERN, " ")
    .replace(URL_PATTERN, " URL ")
    .replace(WHITESPACE_PATTERN, " ")
    .trim();
}
