export const TYPE_TAGS = [
  "integer",
  "float",
  "string",
  "boolean",
  "date",
  "categorical",
] as const;

export type TypeTag = (typeof TYPE_TAGS)[number];

export type CellValue = string | number | boolean | Date | null;

export type RawColumn = {
  name: string;
  type?: string;
  nullable?: boolean;
};

/**
 * A loaded table as handed over by whatever reader the caller uses.
 * Rows are positional and aligned with `columns`.
 */
export type RawDataset = {
  columns: RawColumn[];
  rows: ReadonlyArray<ReadonlyArray<CellValue | undefined>>;
};

export type Column = {
  originalName: string;
  currentName: string;
  declaredType: TypeTag;
  nullable: boolean;
  position: number;
  categories?: string[];
};

export type Schema = {
  columns: readonly Column[];
};

export type DatasetColumn = {
  name: string;
  type: TypeTag;
  nullable: boolean;
};

export type Dataset = {
  columns: DatasetColumn[];
  rows: CellValue[][];
};

export function isTypeTag(v: string): v is TypeTag {
  return TYPE_TAGS.some((t) => t === v);
}

export function isNullish(v: CellValue | undefined): v is null | undefined {
  return v === null || v === undefined;
}
