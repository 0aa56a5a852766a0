import { TypeConversionCatalog } from "../catalog/conversion-catalog";
import { PlanExecutionError } from "../errors";
import { TransformPlan } from "../planner/plan-types";
import { ProvenanceRecord, buildProvenance } from "../reporting/provenance";
import {
  CellValue,
  Column,
  Dataset,
  RawDataset,
  Schema,
  isNullish,
} from "../schema/schema-types";
import { logger } from "../utils/logger";
import { validatePlan } from "./safeguards";

export type ApplyResult = {
  dataset: Dataset;
  schema: Schema;
  provenance: ProvenanceRecord;
  /** Cells set to null after a failed conversion, keyed by original column name. */
  nullInjections: Record<string, number>;
};

function categoriesAt(rows: CellValue[][], position: number): string[] {
  const labels = new Set<string>();
  for (const row of rows) {
    const v = row[position];
    if (typeof v === "string") labels.add(v);
  }
  return Array.from(labels).sort();
}

function logSummary(schema: Schema, plan: TransformPlan, nullInjections: Record<string, number>) {
  for (const c of schema.columns) {
    const target = plan.typeMap[c.originalName];
    if (target !== c.declaredType) {
      logger.info(
        `[executor] Column "${plan.nameMap[c.originalName]}" converted from ${c.declaredType} to ${target}`
      );
    }
  }

  const injected = Object.entries(nullInjections).filter(([, n]) => n > 0);
  if (injected.length === 0) {
    logger.info("[executor] No nulls injected");
    return;
  }
  for (const [column, n] of injected) {
    logger.warn(`[executor] ${column} -> ${plan.nameMap[column]}: ${n} value(s) set to null`);
  }
}

/**
 * Apply a plan to a dataset. All or nothing: a failed conversion on a
 * non-nullable column throws and nothing is returned. Inputs are not mutated.
 */
export function applyPlan(
  dataset: RawDataset,
  schema: Schema,
  plan: TransformPlan,
  catalog: TypeConversionCatalog
): ApplyResult {
  validatePlan(schema, plan, catalog);

  const columns = [...schema.columns].sort((a, b) => a.position - b.position);
  const width = columns.length;
  const nullInjections: Record<string, number> = Object.fromEntries(
    columns.map((c): [string, number] => [c.originalName, 0])
  );

  const rows: CellValue[][] = dataset.rows.map((row, rowIndex) => {
    if (row.length !== width) {
      throw new PlanExecutionError({
        rowIndex,
        reason: `row has ${row.length} cells, expected ${width}`,
      });
    }

    const out = new Array<CellValue>(width).fill(null);

    for (const c of columns) {
      const cell = row[c.position];
      if (isNullish(cell) && !c.nullable) {
        throw new PlanExecutionError({
          column: c.originalName,
          rowIndex,
          reason: "null in a non-nullable column",
        });
      }

      const target = plan.typeMap[c.originalName];
      const res = catalog.tryConvert(cell ?? null, c.declaredType, target);

      if (res.ok) {
        out[plan.orderMap[c.position]] = res.value;
        continue;
      }

      if (!c.nullable) {
        throw new PlanExecutionError({
          column: c.originalName,
          rowIndex,
          reason: res.error.reason,
        });
      }

      logger.debug(`[executor] row ${rowIndex}: ${res.error.message}; writing null`);
      nullInjections[c.originalName] += 1;
    }

    return out;
  });

  const newColumns = columns
    .map((c): Column => {
      const position = plan.orderMap[c.position];
      const declaredType = plan.typeMap[c.originalName];
      const next: Column = {
        originalName: c.originalName,
        currentName: plan.nameMap[c.originalName],
        declaredType,
        nullable: c.nullable,
        position,
      };
      if (declaredType === "categorical") {
        next.categories = categoriesAt(rows, position);
        if (next.categories.length >= catalog.options.cardinalityThreshold) {
          logger.warn(
            `[executor] Column "${next.currentName}" has ${next.categories.length} categories, at or above the threshold of ${catalog.options.cardinalityThreshold}`
          );
        }
      }
      return next;
    })
    .sort((a, b) => a.position - b.position);

  const newSchema: Schema = { columns: newColumns };

  logSummary(schema, plan, nullInjections);

  return {
    dataset: {
      columns: newColumns.map((c) => ({
        name: c.currentName,
        type: c.declaredType,
        nullable: c.nullable,
      })),
      rows,
    },
    schema: newSchema,
    provenance: buildProvenance(schema, plan),
    nullInjections,
  };
}
