/**
 * Helpers shared by the repositories for building parameterized SQL.
 *
 * @module repositories/sql
 */

export interface SetClause {
  /** `column = $n` fragments, in field order. */
  assignments: string[];
  values: unknown[];
}

/**
 * Build the SET list of a partial UPDATE from the defined fields of
 * `changes`. Placeholders are numbered from `firstIndex`, leaving the
 * lower ones to the WHERE clause.
 */
export function buildSetClause<T extends object>(
  changes: T,
  columns: Record<keyof T, string>,
  firstIndex: number,
): SetClause {
  const assignments: string[] = [];
  const values: unknown[] = [];

  for (const key of Object.keys(columns)) {
    if (!isKeyOf(changes, columns, key)) continue;
    const value = changes[key];
    if (value === undefined) continue;
    assignments.push(`${columns[key]} = $${firstIndex + values.length}`);
    values.push(value);
  }

  return { assignments, values };
}

function isKeyOf<T extends object>(
  _changes: T,
  columns: Record<keyof T, string>,
  key: string,
): key is Extract<keyof T, string> {
  return Object.prototype.hasOwnProperty.call(columns, key);
}
