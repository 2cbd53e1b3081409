import fs from "node:fs";
import path from "node:path";
import { ManifestError } from "../errors.js";
import { firstErrorField, loadAjv, type AjvValidateFn } from "../schema/ajv.js";
import type { FlashEntry, FlashManifest, FlashSection, SecurityRecord } from "../types/manifest.js";
import { FLASHER_ARGS_SCHEMA, type RawFlasherArgs } from "./schema.js";

export const FLASHER_ARGS_FILE = "flasher_args.json";

const MODELLED_KEYS = ["write_flash_args", "flash_settings", "flash_files", "extra_esptool_args", "security"];

let validator: AjvValidateFn<RawFlasherArgs> | undefined;

function compileValidator(): AjvValidateFn<RawFlasherArgs> {
  validator ??= loadAjv().compile<RawFlasherArgs>(FLASHER_ARGS_SCHEMA);
  return validator;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeEncrypted(value: unknown): "true" | "false" | undefined {
  if (value === true || value === "true") return "true";
  if (value === false || value === "false") return "false";
  return undefined;
}

function toSection(value: unknown): FlashSection | undefined {
  if (!isRecord(value)) return undefined;
  const { offset, file, encrypted } = value;
  if (typeof offset !== "string" || typeof file !== "string") return undefined;

  const section: FlashSection = { offset, file };
  for (const [key, v] of Object.entries(value)) {
    if (key !== "offset" && key !== "file" && key !== "encrypted") section[key] = v;
  }
  const flag = normalizeEncrypted(encrypted);
  if (flag) section.encrypted = flag;
  return section;
}

/** Offsets are hex strings; "0x1000" and "0x01000" name the same address. */
export function sameOffset(a: string, b: string): boolean {
  return Number.parseInt(a, 16) === Number.parseInt(b, 16);
}

/**
 * Parse a flasher_args document into a FlashManifest.
 * Unknown top-level keys survive in `extensions`; key order survives in `keyOrder`.
 */
export function parseFlashManifest(doc: unknown, source: string = FLASHER_ARGS_FILE): FlashManifest {
  const validate = compileValidator();
  if (!validate(doc)) {
    const field = firstErrorField(validate.errors);
    throw new ManifestError(field, `${source}: invalid field '${field}' (${loadAjv().errorsText(validate.errors)})`, {
      path: source,
    });
  }

  const sections: Record<string, FlashSection> = {};
  const extensions: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(doc)) {
    if (MODELLED_KEYS.includes(key)) continue;
    const section = toSection(value);
    if (section) sections[key] = section;
    else extensions[key] = value;
  }

  const flashFiles: FlashEntry[] = Object.entries(doc.flash_files).map(([offset, file]) => ({ offset, file }));

  let security: SecurityRecord | undefined;
  if (doc.security) {
    security = {
      secure_boot: doc.security.secure_boot,
      encryption: doc.security.encryption,
      force_offsets: [...(doc.security.force_offsets ?? [])],
      read_protected: [...(doc.security.read_protected ?? [])],
    };
    if (doc.security.digest_file !== undefined) security.digest_file = doc.security.digest_file;
  }

  return {
    writeFlashArgs: [...doc.write_flash_args],
    flashSettings: { ...doc.flash_settings },
    flashFiles,
    sections,
    extraEsptoolArgs: { ...doc.extra_esptool_args },
    security,
    extensions,
    keyOrder: Object.keys(doc),
  };
}

/** Read and parse `<buildDir>/flasher_args.json`. */
export function readFlashManifest(buildDir: string): FlashManifest {
  const filePath = path.join(buildDir, FLASHER_ARGS_FILE);
  if (!fs.existsSync(filePath)) {
    throw new ManifestError(FLASHER_ARGS_FILE, `${FLASHER_ARGS_FILE} not found in ${buildDir}`, { path: filePath });
  }

  let doc: unknown;
  try {
    doc = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e: unknown) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ManifestError(FLASHER_ARGS_FILE, `${filePath} is not valid JSON: ${reason}`, { path: filePath });
  }
  return parseFlashManifest(doc, filePath);
}

function valueFor(manifest: FlashManifest, key: string): unknown {
  switch (key) {
    case "write_flash_args":
      return manifest.writeFlashArgs;
    case "flash_settings":
      return manifest.flashSettings;
    case "flash_files":
      return Object.fromEntries(manifest.flashFiles.map((e) => [e.offset, e.file]));
    case "extra_esptool_args":
      return manifest.extraEsptoolArgs;
    case "security":
      return manifest.security;
    default:
      return manifest.sections[key] ?? manifest.extensions[key];
  }
}

/** Inverse of parseFlashManifest. Keys added since parsing go after the original ones. */
export function toFlasherArgs(manifest: FlashManifest): Record<string, unknown> {
  const order = [...manifest.keyOrder];
  const candidates = [
    ...MODELLED_KEYS,
    ...Object.keys(manifest.sections),
    ...Object.keys(manifest.extensions),
  ];
  for (const key of candidates) {
    if (!order.includes(key)) order.push(key);
  }

  const out: Record<string, unknown> = {};
  for (const key of order) {
    const value = valueFor(manifest, key);
    if (value !== undefined) out[key] = value;
  }
  return out;
}

export function serializeFlashManifest(manifest: FlashManifest): string {
  return JSON.stringify(toFlasherArgs(manifest), null, 4) + "\n";
}

/** The flash_files entry the `bootloader` section points at, if both exist. */
export function findBootloaderEntry(manifest: FlashManifest): FlashEntry | undefined {
  const section = manifest.sections["bootloader"];
  if (!section) return undefined;
  return manifest.flashFiles.find((e) => sameOffset(e.offset, section.offset));
}
