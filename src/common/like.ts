import { FindOperator, Raw } from 'typeorm';

export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/**
 * Case-insensitive prefix match. `%` and `_` in `prefix` match themselves.
 * The explicit ESCAPE clause is needed by SQLite, which has no default
 * escape character.
 */
export function startsWithIgnoringCase(prefix: string): FindOperator<string> {
  return Raw((column) => `LOWER(${column}) LIKE LOWER(:prefix) ESCAPE '\\'`, {
    prefix: `${escapeLike(prefix)}%`,
  });
}
