import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { ConfigurationError } from "../infra/errors.js";
import { SprigConfigSchema, type SprigConfig } from "./types.js";

const CONFIG_FILENAMES = [
  "sprig.config.yaml",
  "sprig.config.yml",
  "sprig.config.json",
];

export const DEFAULT_PAGE_STORE_CAPACITY = 10;
export const DEFAULT_PAGE_ID_PARAM = "page_id";
export const DEFAULT_CONTENT_TYPE = "text/html";

export function validateConfig(value: unknown): SprigConfig {
  if (value === null || value === undefined) {
    return {};
  }
  const result = SprigConfigSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid config: ${issues}`);
  }
  return result.data;
}

export function loadConfig(dir?: string): SprigConfig {
  const baseDir = dir ?? process.cwd();

  for (const filename of CONFIG_FILENAMES) {
    const filepath = resolve(baseDir, filename);
    if (existsSync(filepath)) {
      let raw: string;
      try {
        raw = readFileSync(filepath, "utf-8");
      } catch (err) {
        throw new ConfigurationError(`Failed to read config file ${filepath}: ${err instanceof Error ? err.message : String(err)}`);
      }
      let parsed: unknown;
      try {
        parsed = filename.endsWith(".json")
          ? JSON.parse(raw)
          : (parseYaml(raw) ?? {});
      } catch (err) {
        throw new ConfigurationError(`Failed to parse config file ${filepath}: ${err instanceof Error ? err.message : String(err)}`);
      }
      return validateConfig(parsed);
    }
  }

  return {};
}

export function resolvePageStoreCapacity(config: SprigConfig): number {
  return config.pageStore?.capacity ?? DEFAULT_PAGE_STORE_CAPACITY;
}

export function resolvePageIdParam(config: SprigConfig): string {
  return config.session?.pageIdParam ?? DEFAULT_PAGE_ID_PARAM;
}

export function resolveContentType(config: SprigConfig): string {
  return config.render?.contentType ?? DEFAULT_CONTENT_TYPE;
}
