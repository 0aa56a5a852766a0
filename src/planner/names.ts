import { PlanExecutionError } from "../errors";
import { Column } from "../schema/schema-types";
import { SeededRandom } from "./rng";
import defaultTokens from "./name-tokens.json";

export type NameStrategy = "indexed" | "tokens";

export const DEFAULT_NAME_POOL: readonly string[] = defaultTokens;

/**
 * Make `base` unique against `taken`: first `<base>_<position>`, then
 * `<base>_<position>_<k>`. Never draws from the generator.
 */
export function resolveCollision(base: string, position: number, taken: ReadonlySet<string>): string {
  if (!taken.has(base)) return base;

  const indexed = `${base}_${position}`;
  if (!taken.has(indexed)) return indexed;

  for (let k = 1; ; k++) {
    const candidate = `${indexed}_${k}`;
    if (!taken.has(candidate)) return candidate;
  }
}

function indexedNames(count: number, rng: SeededRandom): string[] {
  const names = Array.from({ length: count }, (_, i) => `column_${i}`);
  return rng.shuffle(names);
}

function tokenNames(columns: readonly Column[], pool: readonly string[], rng: SeededRandom): string[] {
  if (pool.length === 0) {
    throw new PlanExecutionError({ reason: "name pool is empty" });
  }

  const taken = new Set<string>();
  return columns.map((c) => {
    const name = resolveCollision(rng.pick(pool), c.position, taken);
    taken.add(name);
    return name;
  });
}

/**
 * New names in original position order. The result is checked for
 * uniqueness before it is returned.
 */
export function generateNames(args: {
  columns: readonly Column[];
  strategy: NameStrategy;
  pool?: readonly string[];
  rng: SeededRandom;
}): string[] {
  const { columns, strategy, rng } = args;

  const names =
    strategy === "indexed"
      ? indexedNames(columns.length, rng)
      : tokenNames(columns, args.pool ?? DEFAULT_NAME_POOL, rng);

  if (new Set(names).size !== names.length) {
    throw new PlanExecutionError({ reason: "generated column names are not unique" });
  }
  return names;
}
