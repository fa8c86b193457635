/**
 * Column tables: a record of equally long columns.
 */

/** A table keyed by column name. */
export type Table = Record<string, readonly unknown[]>;

/**
 * A one-column table holding `list` under `name`.
 *
 * @example
 * ```typescript
 * listToTable(["a", "b"]); // { name: ["a", "b"] }
 * ```
 */
export function listToTable<T>(list: Iterable<T>): { name: T[] } {
  return { name: [...list] };
}

export interface TableToRecordOptions {
  /** Replace `null` and `undefined` cells with `""` */
  replaceMissing?: boolean;
}

/**
 * Copy every column of a table into a record of arrays.
 *
 * @example
 * ```typescript
 * tableToRecord({ name: ["a", null] }, { replaceMissing: true }); // { name: ["a", ""] }
 * ```
 */
export function tableToRecord(table: Table, options: TableToRecordOptions = {}): Record<string, unknown[]> {
  const result: Record<string, unknown[]> = {};
  for (const [column, cells] of Object.entries(table)) {
    result[column] = options.replaceMissing
      ? cells.map((cell) => (cell === null || cell === undefined ? "" : cell))
      : [...cells];
  }
  return result;
}
