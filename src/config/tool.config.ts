import fs from "fs";
import dotenv from "dotenv";
import YAML from "yaml";
import { LogLevel, setLogLevel } from "../utils/logger";
import { EngineOptions, EngineOptionsZ } from "./engine-options";

export type ToolConfig = {
  engine: EngineOptions;
  logLevel: LogLevel;
};

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

function num(env: Env, name: string): number | undefined {
  const v = env[name];
  return v === undefined || v === "" ? undefined : Number(v);
}

function list(env: Env, name: string): string[] | undefined {
  const v = env[name];
  if (v === undefined || v.trim() === "") return undefined;
  return v
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function seedFrom(v: string | undefined): number | string | undefined {
  if (v === undefined || v === "") return undefined;
  if (!/^\d+$/.test(v)) return v;
  // digits beyond the safe range stay a string and get hashed whole
  return Number.isSafeInteger(Number(v)) ? Number(v) : v;
}

function logLevelFrom(v: string | undefined): LogLevel {
  const level = (v ?? "info").toLowerCase();
  const match = LOG_LEVELS.find((l) => l === level);
  if (!match) throw new Error(`Invalid LOG_LEVEL "${v}"`);
  return match;
}

/**
 * Engine options from OBFUSCATOR_* variables, layered over an optional
 * YAML options file (OBFUSCATOR_OPTIONS_FILE). Variables from `envFile`
 * are read with dotenv and never override the real environment. The
 * resolved LOG_LEVEL is applied to the logger.
 */
export function loadToolConfig(args: { envFile?: string; env?: Env } = {}): ToolConfig {
  if (!args.envFile && !args.env) dotenv.config();

  const fileVars = args.envFile ? dotenv.parse(fs.readFileSync(args.envFile)) : {};
  const env: Env = { ...fileVars, ...(args.env ?? process.env) };

  const optionsFile = env.OBFUSCATOR_OPTIONS_FILE;
  const fromFile: unknown = optionsFile ? YAML.parse(fs.readFileSync(optionsFile, "utf8")) : {};
  const base = typeof fromFile === "object" && fromFile !== null ? fromFile : {};

  const fromEnv = {
    seed: seedFrom(env.OBFUSCATOR_SEED),
    cardinalityThreshold: num(env, "OBFUSCATOR_CARDINALITY_THRESHOLD"),
    narrowingEpsilon: num(env, "OBFUSCATOR_NARROWING_EPSILON"),
    sampleFraction: num(env, "OBFUSCATOR_SAMPLE_FRACTION"),
    nameStrategy: env.OBFUSCATOR_NAME_STRATEGY || undefined,
    allowedTargets: list(env, "OBFUSCATOR_ALLOWED_TARGETS"),
    forceTypeChange:
      env.OBFUSCATOR_FORCE_TYPE_CHANGE === undefined
        ? undefined
        : env.OBFUSCATOR_FORCE_TYPE_CHANGE.toLowerCase() === "true",
  };

  const merged: Record<string, unknown> = { ...base };
  for (const [k, v] of Object.entries(fromEnv)) {
    if (v !== undefined) merged[k] = v;
  }

  const engine = EngineOptionsZ.parse(merged);
  const logLevel = logLevelFrom(env.LOG_LEVEL);
  setLogLevel(logLevel);

  return { engine, logLevel };
}
