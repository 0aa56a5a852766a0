import { CellValue, RawDataset, Schema, isNullish } from "../schema/schema-types";
import { SampleProvider } from "./plan-types";

/**
 * Row indices to sample. A fraction of 1 scans every row; smaller
 * fractions take evenly strided rows starting at 0.
 */
export function sampleRowIndices(rowCount: number, fraction = 1): number[] {
  if (!(fraction > 0 && fraction <= 1)) {
    throw new Error(`sampleFraction must be in (0, 1], got ${fraction}`);
  }
  if (fraction === 1) return Array.from({ length: rowCount }, (_, i) => i);

  const size = Math.min(rowCount, Math.ceil(rowCount * fraction));
  const stride = rowCount / Math.max(size, 1);
  return Array.from({ length: size }, (_, i) => Math.floor(i * stride));
}

export function createSampleProvider(
  dataset: RawDataset,
  schema: Schema,
  opts: { sampleFraction?: number } = {}
): SampleProvider {
  const rows = sampleRowIndices(dataset.rows.length, opts.sampleFraction);
  const cache = new Map<number, CellValue[]>();

  for (const c of schema.columns) {
    const values: CellValue[] = [];
    for (const r of rows) {
      const v = dataset.rows[r][c.position];
      if (!isNullish(v)) values.push(v);
    }
    cache.set(c.position, values);
  }

  return (column) => cache.get(column.position) ?? [];
}
