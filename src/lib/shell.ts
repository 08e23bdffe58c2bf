const SAFE_WORD = /^[A-Za-z0-9_\/.,:=@%+-]+$/;

/** Quote one word for a POSIX shell command line. */
export function shellQuote(word: string): string {
  if (SAFE_WORD.test(word)) return word;
  return `'${word.replace(/'/g, `'\\''`)}'`;
}
