/** flasher_args.json as emitted by the build tool (and re-emitted by the rewriter). */
export type RawFlasherArgs = {
  write_flash_args: string[];
  flash_settings: Record<string, unknown>;
  flash_files: Record<string, string>;
  extra_esptool_args: Record<string, unknown>;
  security?: {
    secure_boot: boolean;
    encryption: boolean;
    force_offsets?: string[];
    read_protected?: string[];
    digest_file?: string;
  };
  [key: string]: unknown;
};

const OFFSET_PATTERN = "^0x[0-9a-fA-F]+$";

export const FLASHER_ARGS_SCHEMA = {
  type: "object",
  required: ["write_flash_args", "flash_settings", "flash_files", "extra_esptool_args"],
  properties: {
    write_flash_args: { type: "array", items: { type: "string" } },
    flash_settings: {
      type: "object",
      properties: {
        flash_mode: { type: "string", minLength: 1 },
        flash_freq: { type: "string", minLength: 1 },
        flash_size: { type: "string", minLength: 1 },
      },
    },
    flash_files: {
      type: "object",
      minProperties: 1,
      propertyNames: { type: "string", pattern: OFFSET_PATTERN },
      additionalProperties: { type: "string", minLength: 1 },
    },
    extra_esptool_args: {
      type: "object",
      properties: {
        before: { type: "string" },
        after: { type: "string" },
        chip: { type: "string" },
        stub: { type: "boolean" },
      },
    },
    security: {
      type: "object",
      required: ["secure_boot", "encryption"],
      properties: {
        secure_boot: { type: "boolean" },
        encryption: { type: "boolean" },
        force_offsets: { type: "array", items: { type: "string", pattern: OFFSET_PATTERN } },
        read_protected: { type: "array", items: { type: "string", pattern: OFFSET_PATTERN } },
        digest_file: { type: "string", minLength: 1 },
      },
    },
  },
} as const;

export type RawProjectDescription = {
  project_name?: string;
  project_version?: string;
  [key: string]: unknown;
};

export const PROJECT_DESCRIPTION_SCHEMA = {
  type: "object",
  properties: {
    project_name: { type: "string" },
    project_version: { type: "string" },
  },
} as const;
