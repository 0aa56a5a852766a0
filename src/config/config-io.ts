import fs from "fs";
import YAML from "yaml";
import { EngineOptions, EngineOptionsZ } from "./engine-options";

export function toYamlString(obj: unknown): string {
  return new YAML.Document(obj).toString({ indent: 2 });
}

export function writeYaml(filePath: string, obj: unknown) {
  fs.writeFileSync(filePath, toYamlString(obj), "utf8");
}

export function parseEngineOptionsFromYamlString(text: string): EngineOptions {
  const parsed: unknown = YAML.parse(text);
  return EngineOptionsZ.parse(parsed ?? {});
}

export function readEngineOptions(filePath: string): EngineOptions {
  const raw = fs.readFileSync(filePath, "utf8");
  return parseEngineOptionsFromYamlString(raw);
}
