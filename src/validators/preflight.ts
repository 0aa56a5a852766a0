import { EngineOptions } from "../config/engine-options";
import { SchemaError } from "../errors";
import { RawDataset, Schema } from "../schema/schema-types";
import { logger } from "../utils/logger";

export function preflightValidate(dataset: RawDataset, schema: Schema, options: EngineOptions) {
  if (schema.columns.length === 0) throw new SchemaError("Dataset has no columns");

  if (dataset.rows.length === 0) {
    logger.warn("[preflight] Dataset has no rows; narrowing conversions will keep their type");
  }

  if (options.nameStrategy === "tokens" && options.namePool && options.namePool.length < schema.columns.length) {
    logger.warn(
      `[preflight] Name pool has ${options.namePool.length} tokens for ${schema.columns.length} columns; collisions will be suffixed`
    );
  }

  if (options.allowedTargets && options.allowedTargets.length === 0) {
    logger.warn("[preflight] allowedTargets is empty; every column keeps its type");
  }
}
