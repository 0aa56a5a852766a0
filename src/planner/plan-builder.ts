import { TypeConversionCatalog } from "../catalog/conversion-catalog";
import { Column, Schema, TypeTag } from "../schema/schema-types";
import { logger } from "../utils/logger";
import { generateNames } from "./names";
import { PlanOptions, PlannedColumn, SampleProvider, TransformPlan } from "./plan-types";
import { SeededRandom, hashSeed } from "./rng";

/**
 * Candidate targets for one column, identity first.
 */
function candidateTypes(args: {
  column: Column;
  catalog: TypeConversionCatalog;
  samples: SampleProvider;
  options: PlanOptions;
}): TypeTag[] {
  const { column, catalog, samples, options } = args;
  const source = column.declaredType;

  let legal = catalog.legalTargets(source, samples(column));

  if (options.allowedTargets) {
    const allowed = new Set(options.allowedTargets);
    legal = legal.filter((t) => t === source || allowed.has(t));
  }

  if (options.forceTypeChange && legal.length > 1) {
    legal = legal.filter((t) => t !== source);
  }

  if (legal.length === 1 && legal[0] === source) {
    logger.warn(`[planner] No valid conversion types found for column "${column.originalName}"`);
  }

  return legal;
}

/**
 * Build a transform plan. Deterministic: the generator is created here from
 * the seed and consumed in a fixed order (names, order, types).
 */
export function buildPlan(
  schema: Schema,
  seed: number | string,
  catalog: TypeConversionCatalog,
  samples: SampleProvider,
  options: PlanOptions = {}
): TransformPlan {
  const hashed = hashSeed(seed);
  const rng = new SeededRandom(hashed);
  const columns = [...schema.columns].sort((a, b) => a.position - b.position);

  // 1. names
  const names = generateNames({
    columns,
    strategy: options.nameStrategy ?? "indexed",
    pool: options.namePool,
    rng,
  });
  const nameMap: Record<string, string> = Object.fromEntries(
    columns.map((c, i): [string, string] => [c.originalName, names[i]])
  );

  // 2. order: newOrder[k] is the original position that lands at k
  const newOrder = rng.shuffle(columns.map((c) => c.position));
  const orderMap = new Array<number>(columns.length);
  newOrder.forEach((originalPosition, newPosition) => {
    orderMap[originalPosition] = newPosition;
  });

  // 3. types
  const typeMap: Record<string, TypeTag> = Object.fromEntries(
    columns.map((column): [string, TypeTag] => {
      const candidates = candidateTypes({ column, catalog, samples, options });
      return [column.originalName, rng.pick(candidates)];
    })
  );

  return { seed: hashed, nameMap, orderMap, typeMap };
}

/**
 * Flatten a plan against its schema, ordered by new position.
 */
export function describePlan(schema: Schema, plan: TransformPlan): PlannedColumn[] {
  return schema.columns
    .map((c) => ({
      originalName: c.originalName,
      newName: plan.nameMap[c.originalName],
      originalPosition: c.position,
      newPosition: plan.orderMap[c.position],
      sourceType: c.declaredType,
      targetType: plan.typeMap[c.originalName],
    }))
    .sort((a, b) => a.newPosition - b.newPosition);
}
