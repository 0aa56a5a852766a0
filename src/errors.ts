import type { CellValue, TypeTag } from "./schema/schema-types";

/**
 * Malformed or empty input. Raised before any planning happens.
 */
export class SchemaError extends Error {
  readonly column?: string;
  readonly rowIndex?: number;

  constructor(message: string, details: { column?: string; rowIndex?: number } = {}) {
    super(message);
    this.name = "SchemaError";
    this.column = details.column;
    this.rowIndex = details.rowIndex;
  }
}

/**
 * A single value could not be converted. The executor decides whether
 * this becomes a null or aborts the run.
 */
export class ConversionError extends Error {
  readonly reason: string;
  readonly value: CellValue;
  readonly source: TypeTag;
  readonly target: TypeTag;

  constructor(args: { reason: string; value: CellValue; source: TypeTag; target: TypeTag }) {
    super(`Cannot convert ${JSON.stringify(args.value)} from ${args.source} to ${args.target}: ${args.reason}`);
    this.name = "ConversionError";
    this.reason = args.reason;
    this.value = args.value;
    this.source = args.source;
    this.target = args.target;
  }
}

export class PlanExecutionError extends Error {
  readonly column?: string;
  readonly rowIndex?: number;
  readonly reason: string;

  constructor(args: { reason: string; column?: string; rowIndex?: number }) {
    const where = [
      args.column !== undefined ? `column "${args.column}"` : null,
      args.rowIndex !== undefined ? `row ${args.rowIndex}` : null,
    ]
      .filter((part): part is string => part !== null)
      .join(", ");

    super(where ? `Plan execution failed at ${where}: ${args.reason}` : `Plan execution failed: ${args.reason}`);
    this.name = "PlanExecutionError";
    this.column = args.column;
    this.rowIndex = args.rowIndex;
    this.reason = args.reason;
  }
}
