import { afterEach, beforeAll, describe, it, expect, vi } from "vitest";
import { TypeConversionCatalog } from "../catalog/conversion-catalog";
import { PlanExecutionError } from "../errors";
import { applyPlan } from "../executor/executor";
import { validatePlan } from "../executor/safeguards";
import { obfuscateDataset } from "../index";
import type { TransformPlan } from "../planner/plan-types";
import { extractSchema } from "../schema/schema-reader";
import type { RawDataset } from "../schema/schema-types";
import { logger, setLogLevel } from "../utils/logger";
import { catchError, scenarioDataset } from "./helpers";

const catalog = new TypeConversionCatalog();

const ordersDataset = (): RawDataset => ({
  columns: [
    { name: "id", type: "int64", nullable: false },
    { name: "code", type: "string", nullable: true },
    { name: "amount", type: "float64" },
  ],
  rows: [
    [1, "10", 1.5],
    [2, "x", 2.0],
    [3, null, 3.25],
  ],
});

const ordersPlan = (): TransformPlan => ({
  seed: 0,
  nameMap: { id: "c0", code: "c1", amount: "c2" },
  orderMap: [2, 0, 1],
  typeMap: { id: "string", code: "integer", amount: "float" },
});

beforeAll(() => {
  setLogLevel("silent");
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("applyPlan", () => {
  it("converts, renames and reorders, nulling failures in nullable columns", () => {
    const raw = ordersDataset();
    const result = applyPlan(raw, extractSchema(raw), ordersPlan(), catalog);

    expect(result.dataset.columns).toEqual([
      { name: "c1", type: "integer", nullable: true },
      { name: "c2", type: "float", nullable: false },
      { name: "c0", type: "string", nullable: false },
    ]);
    expect(result.dataset.rows).toEqual([
      [10, 1.5, "1"],
      [null, 2, "2"],
      [null, 3.25, "3"],
    ]);
    expect(result.nullInjections).toEqual({ id: 0, code: 1, amount: 0 });
  });

  it("builds the new schema in new order", () => {
    const raw = ordersDataset();
    const result = applyPlan(raw, extractSchema(raw), ordersPlan(), catalog);

    expect(result.schema.columns).toEqual([
      { originalName: "code", currentName: "c1", declaredType: "integer", nullable: true, position: 0 },
      { originalName: "amount", currentName: "c2", declaredType: "float", nullable: false, position: 1 },
      { originalName: "id", currentName: "c0", declaredType: "string", nullable: false, position: 2 },
    ]);
  });

  it("does not mutate its inputs", () => {
    const raw = ordersDataset();
    const schema = extractSchema(raw);
    const plan = ordersPlan();
    const before = structuredClone({ raw, schema, plan });

    applyPlan(raw, schema, plan, catalog);
    expect({ raw, schema, plan }).toEqual(before);
  });

  it("aborts on a failed conversion in a non-nullable column", () => {
    const raw: RawDataset = {
      columns: [{ name: "qty", type: "string", nullable: false }],
      rows: [["1"], ["two"], ["3"]],
    };
    const plan: TransformPlan = {
      seed: 0,
      nameMap: { qty: "column_0" },
      orderMap: [0],
      typeMap: { qty: "integer" },
    };

    const err = catchError(() => applyPlan(raw, extractSchema(raw), plan, catalog), PlanExecutionError);
    expect(err.column).toBe("qty");
    expect(err.rowIndex).toBe(1);
    expect(err.reason).toBe('"two" is not a valid integer');
    expect(err.message).toBe('Plan execution failed at column "qty", row 1: "two" is not a valid integer');
  });

  describe("rows that do not fit the schema", () => {
    const strict: RawDataset = {
      columns: [
        { name: "a", type: "int", nullable: false },
        { name: "b", type: "int", nullable: false },
      ],
      rows: [[1, 2]],
    };
    const plan: TransformPlan = {
      seed: 0,
      nameMap: { a: "column_0", b: "column_1" },
      orderMap: [0, 1],
      typeMap: { a: "integer", b: "integer" },
    };

    it("rejects a row with missing cells", () => {
      const err = catchError(
        () => applyPlan({ columns: strict.columns, rows: [[1], [2, null]] }, extractSchema(strict), plan, catalog),
        PlanExecutionError
      );
      expect(err.rowIndex).toBe(0);
      expect(err.reason).toBe("row has 1 cells, expected 2");
    });

    it("rejects a null in a non-nullable column", () => {
      const err = catchError(
        () =>
          applyPlan(
            { columns: strict.columns, rows: [[1, 2], [3, null]] },
            extractSchema(strict),
            plan,
            catalog
          ),
        PlanExecutionError
      );
      expect(err.column).toBe("b");
      expect(err.rowIndex).toBe(1);
      expect(err.reason).toBe("null in a non-nullable column");
    });
  });

  it("copies dates instead of sharing them with the input", () => {
    const when = new Date(Date.UTC(2024, 0, 31));
    const raw: RawDataset = { columns: [{ name: "d", type: "date" }], rows: [[when]] };
    const plan: TransformPlan = {
      seed: 0,
      nameMap: { d: "column_0" },
      orderMap: [0],
      typeMap: { d: "date" },
    };

    const result = applyPlan(raw, extractSchema(raw), plan, catalog);
    const out = result.dataset.rows[0][0];
    expect(out).toEqual(when);
    expect(out).not.toBe(when);
  });

  it("warns when a categorical column reaches the cardinality threshold", () => {
    const warn = vi.spyOn(logger, "warn");
    const raw: RawDataset = {
      columns: [{ name: "color", type: "string" }],
      rows: [["red"], ["blue"], ["green"]],
    };
    const plan: TransformPlan = {
      seed: 0,
      nameMap: { color: "column_0" },
      orderMap: [0],
      typeMap: { color: "categorical" },
    };

    applyPlan(raw, extractSchema(raw), plan, new TypeConversionCatalog({ cardinalityThreshold: 2 }));
    expect(warn).toHaveBeenCalledWith(
      '[executor] Column "column_0" has 3 categories, at or above the threshold of 2'
    );
  });

  it("returns the original values for an identity plan", () => {
    const raw = scenarioDataset();
    const plan: TransformPlan = {
      seed: 0,
      nameMap: { id: "id", name: "name", amount: "amount" },
      orderMap: [0, 1, 2],
      typeMap: { id: "integer", name: "string", amount: "float" },
    };
    const result = applyPlan(raw, extractSchema(raw), plan, catalog);
    expect(result.dataset.rows).toEqual(raw.rows);
  });

  it("records categories for categorical targets", () => {
    const raw: RawDataset = { columns: [{ name: "color", type: "string" }], rows: [["red"], ["blue"], ["red"]] };
    const plan: TransformPlan = {
      seed: 0,
      nameMap: { color: "column_0" },
      orderMap: [0],
      typeMap: { color: "categorical" },
    };
    const result = applyPlan(raw, extractSchema(raw), plan, catalog);
    expect(result.schema.columns[0].categories).toEqual(["blue", "red"]);
  });
});

describe("validatePlan", () => {
  const raw = ordersDataset();
  const schema = extractSchema(raw);

  it("accepts a consistent plan", () => {
    expect(() => validatePlan(schema, ordersPlan(), catalog)).not.toThrow();
  });

  it("rejects a name map that is not a bijection", () => {
    const plan = { ...ordersPlan(), nameMap: { id: "x", code: "x", amount: "y" } };
    expect(() => validatePlan(schema, plan, catalog)).toThrow(PlanExecutionError);
  });

  it("rejects an order map that is not a permutation", () => {
    const plan = { ...ordersPlan(), orderMap: [0, 0, 1] };
    expect(() => validatePlan(schema, plan, catalog)).toThrow(
      "Plan execution failed: orderMap is not a permutation of the column positions"
    );
  });

  it("rejects a conversion the catalog does not know", () => {
    const plan: TransformPlan = { ...ordersPlan(), typeMap: { id: "boolean", code: "string", amount: "float" } };
    const err = catchError(() => validatePlan(schema, plan, catalog), PlanExecutionError);
    expect(err.column).toBe("id");
  });

  it("rejects a plan with a missing column", () => {
    const plan = { ...ordersPlan(), nameMap: { id: "c0", code: "c1", other: "c2" } };
    const err = catchError(() => validatePlan(schema, plan, catalog), PlanExecutionError);
    expect(err.column).toBe("amount");
    expect(err.reason).toBe("missing from nameMap");
  });
});

describe("obfuscateDataset", () => {
  const codes = (nullable: boolean): RawDataset => ({
    columns: [{ name: "code", type: "string", nullable }],
    rows: [["1"], ["2"], ["3"], ["oops"]],
  });

  it("nulls a value the sample did not see and counts it", () => {
    const result = obfuscateDataset(codes(true), {
      seed: 42,
      sampleFraction: 0.5,
      allowedTargets: ["integer"],
      forceTypeChange: true,
    });

    expect(result.plan.typeMap).toEqual({ code: "integer" });
    expect(result.dataset.columns).toEqual([{ name: "column_0", type: "integer", nullable: true }]);
    expect(result.dataset.rows).toEqual([[1], [2], [3], [null]]);
    expect(result.nullInjections).toEqual({ code: 1 });
  });

  it("fails the whole run when the column is non-nullable", () => {
    const err = catchError(
      () =>
        obfuscateDataset(codes(false), {
          seed: 42,
          sampleFraction: 0.5,
          allowedTargets: ["integer"],
          forceTypeChange: true,
        }),
      PlanExecutionError
    );
    expect(err.column).toBe("code");
    expect(err.rowIndex).toBe(3);
  });

  it("is reproducible end to end", () => {
    expect(obfuscateDataset(scenarioDataset(), { seed: 42 })).toEqual(
      obfuscateDataset(scenarioDataset(), { seed: 42 })
    );
  });

  it("keeps row count and column set", () => {
    const result = obfuscateDataset(scenarioDataset(), { seed: 7, nameStrategy: "tokens" });
    expect(result.dataset.rows).toHaveLength(3);
    expect(result.dataset.columns).toHaveLength(3);
    expect(new Set(result.dataset.columns.map((c) => c.name)).size).toBe(3);
    expect(Object.values(result.provenance.reverseNameMap).sort()).toEqual(["amount", "id", "name"]);
  });
});
