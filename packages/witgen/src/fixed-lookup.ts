/**
 * Lookups into fixed columns, indexed lazily per column set and known-value
 * pattern.
 */
import type { FieldElement } from "@pilkit/core";
import type { ColumnMap } from "./constant-evaluator.js";

export type LookupOutcome =
  | { readonly kind: "unique"; readonly row: number }
  | { readonly kind: "multiple" }
  | { readonly kind: "none" };

interface IndexEntry {
  row: number;
  count: number;
}

export class FixedLookup {
  private readonly indices = new Map<string, Map<string, IndexEntry>>();

  constructor(private readonly columns: ColumnMap) {}

  /**
   * Finds the rows of `columns` whose values equal the known entries of
   * `values`; undefined entries match anything.
   */
  lookup(columns: readonly string[], values: readonly (FieldElement | undefined)[]): LookupOutcome {
    const known: number[] = [];
    values.forEach((v, i) => {
      if (v !== undefined) known.push(i);
    });
    const index = this.index(columns, known);
    const key = known.map((i) => values[i]?.toString() ?? "").join(",");
    const entry = index.get(key);
    if (!entry) return { kind: "none" };
    return entry.count === 1 ? { kind: "unique", row: entry.row } : { kind: "multiple" };
  }

  value(column: string, row: number): FieldElement | undefined {
    return this.columns.get(column)?.[row];
  }

  private index(columns: readonly string[], known: readonly number[]): Map<string, IndexEntry> {
    const cacheKey = `${columns.join(",")}|${known.join(",")}`;
    const cached = this.indices.get(cacheKey);
    if (cached) return cached;

    const data = known.map((i) => {
      const name = columns[i];
      const values = name === undefined ? undefined : this.columns.get(name);
      if (!values) throw new Error(`Unknown fixed column '${name ?? i}'.`);
      return values;
    });
    const rows = data.length > 0 ? Math.min(...data.map((d) => d.length)) : this.rowCount(columns);
    const index = new Map<string, IndexEntry>();
    for (let row = 0; row < rows; row++) {
      const key = data.map((d) => d[row]?.toString() ?? "").join(",");
      const entry = index.get(key);
      if (entry) entry.count++;
      else index.set(key, { row, count: 1 });
    }
    this.indices.set(cacheKey, index);
    return index;
  }

  private rowCount(columns: readonly string[]): number {
    const [first] = columns;
    return first === undefined ? 0 : this.columns.get(first)?.length ?? 0;
  }
}
