import { TypeConversionCatalog } from "../catalog/conversion-catalog";
import { PlanExecutionError } from "../errors";
import { TransformPlan } from "../planner/plan-types";
import { Schema, isTypeTag } from "../schema/schema-types";

function hasOwn(obj: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

export function isPermutation(values: readonly number[]): boolean {
  const seen = new Array<boolean>(values.length).fill(false);
  for (const v of values) {
    if (!Number.isInteger(v) || v < 0 || v >= values.length || seen[v]) return false;
    seen[v] = true;
  }
  return true;
}

/**
 * Reject a plan that does not fit the schema before any row is touched.
 */
export function validatePlan(schema: Schema, plan: TransformPlan, catalog: TypeConversionCatalog) {
  const n = schema.columns.length;

  if (!isPermutation(schema.columns.map((c) => c.position))) {
    throw new PlanExecutionError({ reason: "schema positions are not a permutation" });
  }

  if (plan.orderMap.length !== n || !isPermutation(plan.orderMap)) {
    throw new PlanExecutionError({ reason: "orderMap is not a permutation of the column positions" });
  }

  const nameKeys = Object.keys(plan.nameMap);
  if (nameKeys.length !== n) {
    throw new PlanExecutionError({
      reason: `nameMap has ${nameKeys.length} entries for ${n} columns`,
    });
  }

  const newNames = new Set<string>();
  for (const c of schema.columns) {
    if (!hasOwn(plan.nameMap, c.originalName)) {
      throw new PlanExecutionError({ column: c.originalName, reason: "missing from nameMap" });
    }
    const next = plan.nameMap[c.originalName];
    if (next.trim() === "" || newNames.has(next)) {
      throw new PlanExecutionError({
        column: c.originalName,
        reason: `nameMap is not a bijection ("${next}" is empty or reused)`,
      });
    }
    newNames.add(next);

    if (!hasOwn(plan.typeMap, c.originalName)) {
      throw new PlanExecutionError({ column: c.originalName, reason: "missing from typeMap" });
    }
    const target = plan.typeMap[c.originalName];
    if (!isTypeTag(target) || !catalog.kindOf(c.declaredType, target)) {
      throw new PlanExecutionError({
        column: c.originalName,
        reason: `conversion ${c.declaredType} -> ${target} is not in the catalog`,
      });
    }
  }
}
