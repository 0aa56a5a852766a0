import type { RawDataset } from "../schema/schema-types";

export function catchError<T extends Error>(fn: () => unknown, type: new (...args: never[]) => T): T {
  try {
    fn();
  } catch (err) {
    if (err instanceof type) return err;
    throw err;
  }
  throw new Error(`expected ${type.name} to be thrown`);
}

export const scenarioDataset = (): RawDataset => ({
  columns: [
    { name: "id", type: "int" },
    { name: "name", type: "string" },
    { name: "amount", type: "float" },
  ],
  rows: [
    [1, "a", 1.0],
    [2, "b", 2.0],
    [3, "c", 3.5],
  ],
});
