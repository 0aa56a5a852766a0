import { SchemaError } from "../errors";
import {
  CellValue,
  Column,
  RawColumn,
  RawDataset,
  Schema,
  TypeTag,
  isNullish,
} from "./schema-types";
import { inferTypeTag, mapDeclaredType, matchesTypeTag } from "./type-mapper";

function resolveType(col: RawColumn, values: Array<CellValue | undefined>): TypeTag {
  if (col.type !== undefined) {
    const mapped = mapDeclaredType(col.type);
    if (!mapped) {
      throw new SchemaError(`Unsupported declared type "${col.type}" for column "${col.name}"`, {
        column: col.name,
      });
    }
    return mapped;
  }

  const inferred = inferTypeTag(values);
  if (!inferred) {
    throw new SchemaError(`Cannot infer a single type for column "${col.name}" (mixed values)`, {
      column: col.name,
    });
  }
  return inferred;
}

function checkValues(column: Column, values: Array<CellValue | undefined>) {
  values.forEach((v, rowIndex) => {
    if (isNullish(v)) {
      if (!column.nullable) {
        throw new SchemaError(
          `Column "${column.originalName}" is declared non-nullable but row ${rowIndex} is null`,
          { column: column.originalName, rowIndex }
        );
      }
      return;
    }

    if (!matchesTypeTag(v, column.declaredType)) {
      throw new SchemaError(
        `Value ${JSON.stringify(v)} in row ${rowIndex} does not match type ${column.declaredType} of column "${column.originalName}"`,
        { column: column.originalName, rowIndex }
      );
    }
  });
}

function categoriesOf(values: Array<CellValue | undefined>): string[] {
  const labels = new Set<string>();
  for (const v of values) {
    if (typeof v === "string") labels.add(v);
  }
  return Array.from(labels).sort();
}

/**
 * Build the schema of a loaded dataset. Pure: the dataset is only read.
 */
export function extractSchema(raw: RawDataset): Schema {
  if (raw.columns.length === 0) {
    throw new SchemaError("Dataset has no columns");
  }

  const seen = new Set<string>();
  for (const c of raw.columns) {
    if (c.name.trim() === "") {
      throw new SchemaError("Column names must not be empty");
    }
    if (seen.has(c.name)) {
      throw new SchemaError(`Duplicate column name "${c.name}"`, { column: c.name });
    }
    seen.add(c.name);
  }

  raw.rows.forEach((row, rowIndex) => {
    if (row.length !== raw.columns.length) {
      throw new SchemaError(
        `Row ${rowIndex} has ${row.length} cells, expected ${raw.columns.length}`,
        { rowIndex }
      );
    }
  });

  const columns = raw.columns.map((c, position): Column => {
    const values = raw.rows.map((row) => row[position]);
    const declaredType = resolveType(c, values);

    const column: Column = {
      originalName: c.name,
      currentName: c.name,
      declaredType,
      nullable: c.nullable ?? values.some((v) => isNullish(v)),
      position,
    };
    checkValues(column, values);

    if (declaredType === "categorical") {
      column.categories = categoriesOf(values);
    }
    return column;
  });

  return { columns };
}
