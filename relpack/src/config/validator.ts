import { loadAjv, type AjvValidateFn } from "../schema/ajv.js";
import type { RelpackConfig } from "../types/config.js";

const overlayList = { type: "array", items: { type: "string", minLength: 1 } } as const;

/** Every key has a default in config/base.yaml, so all are required after merging. */
const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "build_dir", "output_dir", "signing_key", "build_tool", "flash", "bundle"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    build_dir: { type: "string", minLength: 1 },
    output_dir: { type: "string", minLength: 1 },
    signing_key: { type: "string" },
    build_tool: {
      type: "object",
      required: ["command", "overlays"],
      properties: {
        command: { type: "string", minLength: 1 },
        overlays: {
          type: "object",
          required: ["dev", "release"],
          properties: { dev: overlayList, release: overlayList },
        },
      },
    },
    flash: {
      type: "object",
      required: ["default_port", "baud"],
      properties: {
        default_port: { type: "string", minLength: 1 },
        baud: { type: "integer", minimum: 9600 },
      },
    },
    bundle: {
      type: "object",
      required: ["extra_files"],
      properties: {
        extra_files: { type: "array", items: { type: "string", minLength: 1 } },
      },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: RelpackConfig }
  | { valid: false; errors: string };

let validator: AjvValidateFn<RelpackConfig> | undefined;

/** Validate a merged config object against the config schema. */
export function validateConfig(config: unknown): ConfigValidationResult {
  const ajv = loadAjv();
  validator ??= ajv.compile<RelpackConfig>(CONFIG_SCHEMA);
  if (validator(config)) return { valid: true, config };
  return { valid: false, errors: ajv.errorsText(validator.errors) };
}
