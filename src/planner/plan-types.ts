import { CellValue, Column, TypeTag } from "../schema/schema-types";
import { NameStrategy } from "./names";

export type TransformPlan = {
  /** Hashed seed the plan was drawn from. */
  seed: number;
  /** original name -> new name */
  nameMap: Record<string, string>;
  /** Indexed by original position; value is the new position. */
  orderMap: number[];
  /** original name -> target type */
  typeMap: Record<string, TypeTag>;
};

export type PlanOptions = {
  nameStrategy?: NameStrategy;
  namePool?: readonly string[];
  /** Targets the planner may pick besides the identity. */
  allowedTargets?: readonly TypeTag[];
  /** Drop the identity whenever another legal target exists. */
  forceTypeChange?: boolean;
};

/** Non-null sampled values of a column. */
export type SampleProvider = (column: Column) => ReadonlyArray<CellValue>;

export type PlannedColumn = {
  originalName: string;
  newName: string;
  originalPosition: number;
  newPosition: number;
  sourceType: TypeTag;
  targetType: TypeTag;
};
