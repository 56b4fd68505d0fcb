/**
 * Wraps `unescaped` in `quoteChar`, doubling every embedded occurrence of it.
 * No other character is touched.
 */
function quote(quoteChar: '"' | "'", unescaped: string): string {
  return `${quoteChar}${unescaped.split(quoteChar).join(quoteChar + quoteChar)}${quoteChar}`;
}

/** Quotes an SQL identifier (`"..."`). */
export function escapeIdent(unescaped: string): string {
  return quote('"', unescaped);
}

/** Quotes an SQL string literal (`'...'`). */
export function escapeString(unescaped: string): string {
  return quote("'", unescaped);
}
