import { z } from "zod";
import { TYPE_TAGS } from "../schema/schema-types";

export const EngineOptionsZ = z
  .object({
    seed: z.union([z.number().int(), z.string()]).default(0),
    cardinalityThreshold: z.number().int().min(1).default(50),
    narrowingEpsilon: z.number().min(0).lt(0.5).default(0),
    sampleFraction: z.number().gt(0).max(1).default(1),
    nameStrategy: z.enum(["indexed", "tokens"]).default("indexed"),
    namePool: z.array(z.string().min(1)).min(1).optional(),
    allowedTargets: z.array(z.enum(TYPE_TAGS)).optional(),
    forceTypeChange: z.boolean().default(false),
  })
  .strict();

/** Options after defaults were applied. */
export type EngineOptions = z.output<typeof EngineOptionsZ>;

/** Options as a caller or an options file writes them. */
export type EngineOptionsInput = z.input<typeof EngineOptionsZ>;

export function resolveEngineOptions(input: EngineOptionsInput = {}): EngineOptions {
  return EngineOptionsZ.parse(input);
}
