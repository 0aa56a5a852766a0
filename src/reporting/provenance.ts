import { SchemaError } from "../errors";
import { TransformPlan } from "../planner/plan-types";
import { CellValue, Column, Dataset, Schema, TypeTag } from "../schema/schema-types";

/**
 * Structural record of a transformation. Values are never kept, so it
 * can explain or undo the layout but not restore the data.
 */
export type ProvenanceRecord = {
  seed: number;
  originalSchema: Schema;
  /** new name -> original name */
  reverseNameMap: Record<string, string>;
  /** Indexed by original position; value is the new position. */
  orderMap: number[];
  /** original name -> target type */
  typeMap: Record<string, TypeTag>;
};

function copyColumn(c: Column): Column {
  return c.categories ? { ...c, categories: [...c.categories] } : { ...c };
}

export function buildProvenance(schema: Schema, plan: TransformPlan): ProvenanceRecord {
  return {
    seed: plan.seed,
    originalSchema: { columns: schema.columns.map(copyColumn) },
    reverseNameMap: Object.fromEntries(
      Object.entries(plan.nameMap).map(([from, to]): [string, string] => [to, from])
    ),
    orderMap: [...plan.orderMap],
    typeMap: { ...plan.typeMap },
  };
}

/**
 * Put a transformed dataset back into its original column names and order.
 * Cell values keep their converted types.
 */
export function restoreLayout(dataset: Dataset, provenance: ProvenanceRecord): Dataset {
  const original = [...provenance.originalSchema.columns].sort((a, b) => a.position - b.position);

  const sourceIndex = original.map((c) => {
    const idx = dataset.columns.findIndex(
      (d) => provenance.reverseNameMap[d.name] === c.originalName
    );
    if (idx < 0) {
      throw new SchemaError(`Column "${c.originalName}" has no counterpart in the dataset`, {
        column: c.originalName,
      });
    }
    return idx;
  });

  return {
    columns: sourceIndex.map((idx, p) => ({
      name: original[p].originalName,
      type: dataset.columns[idx].type,
      nullable: dataset.columns[idx].nullable,
    })),
    rows: dataset.rows.map((row): CellValue[] => sourceIndex.map((idx) => row[idx])),
  };
}

export function explainProvenance(provenance: ProvenanceRecord): string[] {
  const newNameOf = new Map(
    Object.entries(provenance.reverseNameMap).map(([to, from]): [string, string] => [from, to])
  );

  return [...provenance.originalSchema.columns]
    .sort((a, b) => a.position - b.position)
    .map((c) => {
      const target = provenance.typeMap[c.originalName];
      const typeNote = target === c.declaredType ? c.declaredType : `${c.declaredType} -> ${target}`;
      return `"${c.originalName}" @${c.position} => "${newNameOf.get(c.originalName)}" @${provenance.orderMap[c.position]} (${typeNote})`;
    });
}
