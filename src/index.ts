import { TypeConversionCatalog } from "./catalog/conversion-catalog";
import { EngineOptionsInput, resolveEngineOptions } from "./config/engine-options";
import { applyPlan } from "./executor/executor";
import { buildPlan, describePlan } from "./planner/plan-builder";
import { TransformPlan } from "./planner/plan-types";
import { createSampleProvider } from "./planner/sample-provider";
import { ProvenanceRecord } from "./reporting/provenance";
import { extractSchema } from "./schema/schema-reader";
import { Dataset, RawDataset, Schema } from "./schema/schema-types";
import { logger } from "./utils/logger";
import { preflightValidate } from "./validators/preflight";

export type ObfuscationResult = {
  plan: TransformPlan;
  dataset: Dataset;
  schema: Schema;
  provenance: ProvenanceRecord;
  nullInjections: Record<string, number>;
};

/**
 * extract -> preflight -> plan -> apply. Throws SchemaError,
 * PlanExecutionError or a zod error; never returns partial output.
 */
export function obfuscateDataset(raw: RawDataset, input: EngineOptionsInput = {}): ObfuscationResult {
  const options = resolveEngineOptions(input);

  const schema = extractSchema(raw);
  preflightValidate(raw, schema, options);
  logger.info(`Schema extracted: ${schema.columns.length} columns, ${raw.rows.length} rows`);

  const catalog = new TypeConversionCatalog({
    cardinalityThreshold: options.cardinalityThreshold,
    narrowingEpsilon: options.narrowingEpsilon,
  });
  const samples = createSampleProvider(raw, schema, { sampleFraction: options.sampleFraction });

  const plan = buildPlan(schema, options.seed, catalog, samples, {
    nameStrategy: options.nameStrategy,
    namePool: options.namePool,
    allowedTargets: options.allowedTargets,
    forceTypeChange: options.forceTypeChange,
  });
  for (const p of describePlan(schema, plan)) {
    logger.debug(
      `[planner] ${p.originalName}@${p.originalPosition} -> ${p.newName}@${p.newPosition} (${p.sourceType} -> ${p.targetType})`
    );
  }
  logger.info(`Plan built with seed ${plan.seed}`);

  const result = applyPlan(raw, schema, plan, catalog);
  logger.info("Obfuscation completed successfully ✅");

  return { plan, ...result };
}

export { TypeConversionCatalog, DEFAULT_CATALOG_OPTIONS } from "./catalog/conversion-catalog";
export type { CatalogOptions, ConversionKind, ConversionResult } from "./catalog/conversion-catalog";
export { EngineOptionsZ, resolveEngineOptions } from "./config/engine-options";
export type { EngineOptions, EngineOptionsInput } from "./config/engine-options";
export { readEngineOptions, parseEngineOptionsFromYamlString, writeYaml, toYamlString } from "./config/config-io";
export { loadToolConfig } from "./config/tool.config";
export type { ToolConfig } from "./config/tool.config";
export { SchemaError, ConversionError, PlanExecutionError } from "./errors";
export { applyPlan } from "./executor/executor";
export type { ApplyResult } from "./executor/executor";
export { validatePlan } from "./executor/safeguards";
export { buildPlan, describePlan } from "./planner/plan-builder";
export type { TransformPlan, PlanOptions, PlannedColumn, SampleProvider } from "./planner/plan-types";
export { createSampleProvider } from "./planner/sample-provider";
export { hashSeed, SeededRandom } from "./planner/rng";
export { buildProvenance, restoreLayout, explainProvenance } from "./reporting/provenance";
export type { ProvenanceRecord } from "./reporting/provenance";
export { writeJsonReport } from "./reporting/report-writer";
export { extractSchema } from "./schema/schema-reader";
export { mapDeclaredType, inferTypeTag } from "./schema/type-mapper";
export { TYPE_TAGS } from "./schema/schema-types";
export type {
  CellValue,
  Column,
  Dataset,
  DatasetColumn,
  RawColumn,
  RawDataset,
  Schema,
  TypeTag,
} from "./schema/schema-types";
export { logger, setLogLevel } from "./utils/logger";
export type { LogLevel } from "./utils/logger";
