// src/schema/type-mapper.ts

import { CellValue, TYPE_TAGS, TypeTag, isNullish } from "./schema-types";

const DECLARED: Record<TypeTag, string[]> = {
  integer: ["int", "int8", "int16", "int32", "int64", "integer", "bigint", "smallint"],
  float: ["float", "float32", "float64", "double", "decimal", "numeric", "real", "number"],
  string: ["str", "string", "text", "varchar", "object"],
  boolean: ["bool", "boolean"],
  date: ["date", "datetime", "datetime64", "timestamp"],
  categorical: ["category", "categorical", "enum"],
};

/**
 * Map a declared type name (pandas, SQL or plain) to a TypeTag.
 * Returns undefined when the name is not recognised.
 */
export function mapDeclaredType(declared: string): TypeTag | undefined {
  const t = declared.trim().toLowerCase();

  return TYPE_TAGS.find((tag) => DECLARED[tag].includes(t));
}

/**
 * Runtime shape check of a non-null value against a tag.
 */
export function matchesTypeTag(value: CellValue, tag: TypeTag): boolean {
  switch (tag) {
    case "integer":
      return typeof value === "number" && Number.isSafeInteger(value);
    case "float":
      return typeof value === "number" && Number.isFinite(value);
    case "string":
    case "categorical":
      return typeof value === "string";
    case "boolean":
      return typeof value === "boolean";
    case "date":
      return value instanceof Date && !Number.isNaN(value.valueOf());
  }
}

/**
 * Infer a tag from the non-null values of a column. Returns undefined for
 * mixed columns. A column without values is a string column.
 */
export function inferTypeTag(values: ReadonlyArray<CellValue | undefined>): TypeTag | undefined {
  const present = values.filter((v): v is Exclude<CellValue, null> => !isNullish(v));
  if (present.length === 0) return "string";

  if (present.every((v) => typeof v === "boolean")) return "boolean";
  if (present.every((v) => matchesTypeTag(v, "integer"))) return "integer";
  if (present.every((v) => matchesTypeTag(v, "float"))) return "float";
  if (present.every((v) => matchesTypeTag(v, "date"))) return "date";
  if (present.every((v) => typeof v === "string")) return "string";

  return undefined;
}
