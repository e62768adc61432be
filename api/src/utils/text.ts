/**
 * Title-case every run of letters: first letter upper, rest lower.
 * Any non-letter starts a new word, so "o'neil" becomes "O'Neil"
 * and "3rd" becomes "3Rd".
 */
export function titleCase(value: string): string {
  return value.replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}
