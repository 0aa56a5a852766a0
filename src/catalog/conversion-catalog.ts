import { ConversionError } from "../errors";
import { CellValue, TYPE_TAGS, TypeTag, isNullish } from "../schema/schema-types";
import { matchesTypeTag } from "../schema/type-mapper";
import {
  formatValue,
  parseBoolean,
  parseFloatStrict,
  parseInteger,
  parseIsoDate,
} from "./parsers";

export type CatalogOptions = {
  /** Distinct sampled values must stay strictly below this for categorical targets. */
  cardinalityThreshold: number;
  /** Largest fractional part accepted when narrowing float to integer. */
  narrowingEpsilon: number;
};

export const DEFAULT_CATALOG_OPTIONS: CatalogOptions = {
  cardinalityThreshold: 50,
  narrowingEpsilon: 0,
};

export type ConversionKind =
  | "identity"
  | "widening"
  | "narrowing"
  | "stringify"
  | "parse"
  | "categorize";

type Present = Exclude<CellValue, null>;

type Step = { ok: true; value: CellValue } | { ok: false; reason: string };

type ConversionRule = {
  kind: ConversionKind;
  step: (value: Present, opts: CatalogOptions) => Step;
};

export type ConversionResult =
  | { ok: true; value: CellValue }
  | { ok: false; error: ConversionError };

const ok = (value: CellValue): Step => ({ ok: true, value });
const fail = (reason: string): Step => ({ ok: false, reason });

function label(v: Present): string {
  return formatValue(v);
}

function parseWith<T extends CellValue>(
  parse: (s: string) => T | undefined,
  what: string
): ConversionRule {
  return {
    kind: "parse",
    step: (v) => {
      const parsed = parse(String(v));
      return parsed === undefined ? fail(`"${String(v)}" is not a valid ${what}`) : ok(parsed);
    },
  };
}

const IDENTITY: ConversionRule = {
  kind: "identity",
  step: (v) => ok(v instanceof Date ? new Date(v.getTime()) : v),
};
const STRINGIFY: ConversionRule = { kind: "stringify", step: (v) => ok(label(v)) };
const CATEGORIZE: ConversionRule = { kind: "categorize", step: (v) => ok(label(v)) };

const TO_INTEGER = parseWith(parseInteger, "integer");
const TO_FLOAT = parseWith(parseFloatStrict, "float");
const TO_BOOLEAN = parseWith(parseBoolean, "boolean");
const TO_DATE = parseWith(parseIsoDate, "ISO-8601 date");

const WIDEN: ConversionRule = { kind: "widening", step: (v) => ok(v) };

const NARROW: ConversionRule = {
  kind: "narrowing",
  step: (v, opts) => {
    if (typeof v !== "number") return fail("not a number");
    const rounded = Math.round(v);
    const fraction = Math.abs(v - rounded);
    if (fraction > opts.narrowingEpsilon) {
      return fail(`fractional part ${fraction} exceeds epsilon ${opts.narrowingEpsilon}`);
    }
    if (!Number.isSafeInteger(rounded)) return fail("outside the safe integer range");
    return ok(rounded);
  },
};

/**
 * Directional (source, target) lookup table. Pairs that are missing are illegal.
 */
const RULES: Record<TypeTag, Partial<Record<TypeTag, ConversionRule>>> = {
  integer: { integer: IDENTITY, float: WIDEN, string: STRINGIFY, categorical: CATEGORIZE },
  float: { float: IDENTITY, integer: NARROW, string: STRINGIFY, categorical: CATEGORIZE },
  string: {
    string: IDENTITY,
    integer: TO_INTEGER,
    float: TO_FLOAT,
    boolean: TO_BOOLEAN,
    date: TO_DATE,
    categorical: CATEGORIZE,
  },
  boolean: { boolean: IDENTITY, string: STRINGIFY, categorical: CATEGORIZE },
  date: { date: IDENTITY, string: STRINGIFY, categorical: CATEGORIZE },
  categorical: {
    categorical: IDENTITY,
    string: STRINGIFY,
    integer: TO_INTEGER,
    float: TO_FLOAT,
    boolean: TO_BOOLEAN,
    date: TO_DATE,
  },
};

export class TypeConversionCatalog {
  readonly options: CatalogOptions;

  constructor(options: Partial<CatalogOptions> = {}) {
    this.options = { ...DEFAULT_CATALOG_OPTIONS, ...options };
  }

  /** Kind of a (source, target) pair, or undefined when the pair is never legal. */
  kindOf(source: TypeTag, target: TypeTag): ConversionKind | undefined {
    return RULES[source][target]?.kind;
  }

  isLegal(source: TypeTag, target: TypeTag, sampleValues: ReadonlyArray<CellValue>): boolean {
    if (source === target) return true;

    const rule = RULES[source][target];
    if (!rule) return false;

    const present = sampleValues.filter((v): v is Present => !isNullish(v));

    // With nothing to look at, a lossy conversion keeps the original type.
    if (rule.kind === "narrowing" && present.length === 0) return false;

    if (rule.kind === "categorize") {
      const distinct = new Set(present.map(label));
      if (distinct.size >= this.options.cardinalityThreshold) return false;
    }

    return present.every((v) => this.tryConvert(v, source, target).ok);
  }

  /** Identity first, then every other legal target in tag order. */
  legalTargets(source: TypeTag, sampleValues: ReadonlyArray<CellValue>): TypeTag[] {
    return [
      source,
      ...TYPE_TAGS.filter((t) => t !== source && this.isLegal(source, t, sampleValues)),
    ];
  }

  tryConvert(value: CellValue, source: TypeTag, target: TypeTag): ConversionResult {
    if (isNullish(value)) return { ok: true, value: null };

    const rule = RULES[source][target];
    const error = (reason: string): ConversionResult => ({
      ok: false,
      error: new ConversionError({ reason, value, source, target }),
    });

    if (!rule) return error("conversion is not supported");
    if (!matchesTypeTag(value, source)) return error(`value does not match source type ${source}`);

    const res = rule.step(value, this.options);
    return res.ok ? { ok: true, value: res.value } : error(res.reason);
  }

  convert(value: CellValue, source: TypeTag, target: TypeTag): CellValue {
    const res = this.tryConvert(value, source, target);
    if (!res.ok) throw res.error;
    return res.value;
  }
}
