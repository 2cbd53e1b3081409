import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { ConfigurationError } from "../errors.js";
import type { RelpackConfig } from "../types/config.js";
import { validateConfig } from "./validator.js";

const DEFAULTS_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const PROJECT_CONFIG_FILE = "relpack.yaml";

/** RELPACK_BUILD_DIR → build_dir, and so on. Only path-valued keys can be overridden. */
const ENV_OVERRIDES: Record<string, keyof RelpackConfig> = {
  RELPACK_BUILD_DIR: "build_dir",
  RELPACK_OUTPUT_DIR: "output_dir",
  RELPACK_SIGNING_KEY: "signing_key",
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return the parsed mapping, or an empty one if the file is absent. */
function loadYaml(filePath: string, required: boolean): Record<string, unknown> {
  if (!fs.existsSync(filePath)) {
    if (required) throw new ConfigurationError("config", `Config file not found: ${filePath}`, { path: filePath });
    return {};
  }
  let parsed: unknown;
  try {
    parsed = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e: unknown) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ConfigurationError("config", `Config file ${filePath} is not valid YAML: ${reason}`, { path: filePath });
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError("config", `Config file ${filePath} must contain a mapping`, { path: filePath });
  }
  return parsed;
}

function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result = { ...config };
  for (const [name, key] of Object.entries(ENV_OVERRIDES)) {
    const value = env[name];
    if (value !== undefined && value.length > 0) result[key] = value;
  }
  return result;
}

export type LoadConfigOptions = {
  /** Directory holding relpack.yaml; ignored when `configFile` is given. */
  projectRoot?: string;
  /** Explicit project config file; must exist. */
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  defaultsDir?: string;
};

/**
 * Load layered config: package base.yaml ← project relpack.yaml ← RELPACK_* variables.
 * The environment is passed in rather than read from the process.
 */
export function loadConfig(opts: LoadConfigOptions = {}): RelpackConfig {
  const base = loadYaml(path.join(opts.defaultsDir ?? DEFAULTS_DIR, "base.yaml"), true);

  let merged = base;
  if (opts.configFile) {
    merged = deepMerge(base, loadYaml(path.resolve(opts.configFile), true));
  } else if (opts.projectRoot) {
    merged = deepMerge(base, loadYaml(path.join(opts.projectRoot, PROJECT_CONFIG_FILE), false));
  }

  merged = applyEnvOverrides(merged, opts.env ?? {});

  const result = validateConfig(merged);
  if (!result.valid) {
    throw new ConfigurationError("config", `Invalid configuration: ${result.errors}`);
  }
  return result.config;
}
