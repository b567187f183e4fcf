/**
 * Everything about a program that stays fixed during witness generation:
 * the row count, fixed column values and the witness column layout.
 */
import type { Analyzed, Expression, FieldElement, Polynomial, PolynomialReference } from "@pilkit/core";
import { columnName, generateFixedColumns, programDegree, type ColumnMap } from "./constant-evaluator.js";

export interface WitnessColumn {
  /** Dense index over committed polynomials, array elements included. */
  readonly id: number;
  readonly name: string;
  readonly poly: Polynomial;
  /** The query that may supply values for this column. */
  readonly query?: Expression;
}

export class FixedData {
  readonly degree: number;
  readonly fixedColumns: ColumnMap;
  readonly witnessColumns: readonly WitnessColumn[];

  constructor(
    readonly analyzed: Analyzed,
    fixedColumns: ColumnMap = generateFixedColumns(analyzed)
  ) {
    this.degree = programDegree(analyzed);
    this.fixedColumns = fixedColumns;
    const columns: WitnessColumn[] = [];
    for (const [poly, value] of analyzed.committedPolysInSourceOrder()) {
      const query = value?.kind === "Query" ? value.expr : undefined;
      if (poly.length === undefined) {
        columns.push({ id: poly.id, name: poly.absoluteName, poly, query });
        continue;
      }
      for (let i = 0; i < poly.length; i++) {
        columns.push({ id: poly.id + i, name: columnName(poly.absoluteName, i), poly, query });
      }
    }
    this.witnessColumns = columns.sort((a, b) => a.id - b.id);
  }

  get witnessCount(): number {
    return this.witnessColumns.length;
  }

  polynomial(reference: PolynomialReference): Polynomial | undefined {
    return this.analyzed.polynomial(reference.name);
  }

  /** The witness column a reference points at, if it is committed. */
  witnessId(reference: PolynomialReference): number | undefined {
    const poly = this.polynomial(reference);
    if (poly?.polyType !== "Committed") return undefined;
    return poly.id + (reference.index ?? 0);
  }

  witnessName(id: number): string {
    return this.witnessColumns[id]?.name ?? `#${id}`;
  }

  fixedValue(reference: PolynomialReference, row: number): FieldElement | undefined {
    return this.fixedColumns.get(columnName(reference.name, reference.index))?.[row];
  }
}
