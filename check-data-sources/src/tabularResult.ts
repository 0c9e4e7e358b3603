export type Scalar = string | number | boolean | null;

export type Row = Readonly<Record<string, Scalar>>;

/**
 * Anything the availability checker can inspect. Providers may return any
 * container that can report how many rows it holds.
 */
export interface TabularResult {
  rowCount(): number;
}

/**
 * In-memory table: ordered rows keyed by column name.
 *
 * Columns are the union of all row keys in first-seen order. Rows are copied
 * and frozen so a table handed to the checker cannot change underneath it.
 */
export class Table implements TabularResult {
  public readonly columns: readonly string[];
  public readonly rows: readonly Row[];

  constructor(rows: readonly Row[], columns?: readonly string[]) {
    this.rows = Object.freeze(rows.map(row => Object.freeze({ ...row })));

    if (columns) {
      this.columns = Object.freeze([...columns]);
      return;
    }

    const seen: string[] = [];
    for (const row of this.rows) {
      for (const key of Object.keys(row)) {
        if (!seen.includes(key)) {
          seen.push(key);
        }
      }
    }
    this.columns = Object.freeze(seen);
  }

  public static empty(columns: readonly string[] = []): Table {
    return new Table([], columns);
  }

  public rowCount(): number {
    return this.rows.length;
  }

  public isEmpty(): boolean {
    return this.rows.length === 0;
  }

  /**
   * Values of one column, in row order. Rows without the key yield null.
   */
  public column(name: string): Scalar[] {
    return this.rows.map(row => row[name] ?? null);
  }
}
