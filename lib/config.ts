import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod/v4";
import { BookIoError, ConfigError, errorMessage } from "./errors.js";

const markdownSchema = z.object({
  html: z.boolean().default(true),
  footnotes: z.boolean().default(true),
});

const configSchema = z.object({
  manifest: z.string().min(1).default("SUMMARY.md"),
  source_dir: z.string().min(1).default("src"),
  output_file: z.string().min(1).default("book.tex"),
  toc_command: z.string().default("\\placecontent"),
  preamble_template: z.string().min(1).default("preamble"),
  markdown: markdownSchema.default({ html: true, footnotes: true }),
});

export type AppConfig = z.infer<typeof configSchema>;

/** Name of the per-book override file, looked up in the book directory. */
export const BOOK_CONFIG_FILE = "book.yaml";

/**
 * Deep-merge two plain objects. Plain objects recurse;
 * arrays and primitives: override wins.
 */
export function deepMerge<T extends Record<string, unknown>>(
  base: T,
  overrides: Record<string, unknown>
): T {
  const result = { ...base } as Record<string, unknown>;
  for (const key of Object.keys(overrides)) {
    const baseVal = result[key];
    const overVal = overrides[key];
    if (isPlainObject(baseVal) && isPlainObject(overVal)) {
      result[key] = deepMerge(baseVal, overVal);
    } else {
      result[key] = overVal;
    }
  }
  return result as T;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function defaultConfig(): AppConfig {
  return configSchema.parse({});
}

export function parseConfig(raw: unknown, source: string): AppConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(
      "invalid-config",
      `invalid configuration in ${source}`,
      z.prettifyError(result.error)
    );
  }
  return result.data;
}

/**
 * Load `config.yaml`. Without an explicit path a missing file in the working
 * directory means defaults.
 */
export function loadConfig(configPath?: string): AppConfig {
  const resolved = configPath ?? path.resolve(process.cwd(), "config.yaml");
  if (configPath === undefined && !fs.existsSync(resolved)) return defaultConfig();
  return parseConfig(readYaml(resolved), resolved);
}

/** Apply `<bookDir>/book.yaml` on top of `base` when the book has one. */
export function loadBookConfig(bookDir: string, base: AppConfig): AppConfig {
  const bookConfigPath = path.join(bookDir, BOOK_CONFIG_FILE);
  if (!fs.existsSync(bookConfigPath)) return base;
  const overrides = readYaml(bookConfigPath) ?? {};
  if (!isPlainObject(overrides)) {
    throw new ConfigError(
      "invalid-config",
      `invalid configuration in ${bookConfigPath}`,
      "expected a mapping at the top level"
    );
  }
  return parseConfig(deepMerge(base, overrides), bookConfigPath);
}

function readYaml(file: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(file, "utf-8");
  } catch (err) {
    throw new BookIoError("read-failed", `failed to read ${file}`, errorMessage(err), {
      cause: err,
    });
  }
  try {
    return yaml.load(raw);
  } catch (err) {
    throw new ConfigError("invalid-config", `invalid YAML in ${file}`, errorMessage(err), {
      cause: err,
    });
  }
}
