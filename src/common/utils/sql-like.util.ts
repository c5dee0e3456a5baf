const LIKE_SPECIAL = /[\\%_]/g;

/** Escapes `%`, `_` and `\` for a `LIKE ... ESCAPE '\'` pattern. */
export function escapeLike(value: string): string {
  return value.replace(LIKE_SPECIAL, (c) => `\\${c}`);
}
