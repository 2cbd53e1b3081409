import { findBootloaderEntry, sameOffset } from "../manifest/flash-manifest.js";
import type { FlashManifest, SecurityPosture, SecurityRecord } from "../types/manifest.js";
import { ENCRYPT_FLAG } from "./classifier.js";

export const FORCE_FLAG = "--force";

const FLASH_SETTING_FLAGS = ["--flash_mode", "--flash_freq", "--flash_size"];

function addUnique(list: string[], value: string, position: "start" | "end" = "end"): void {
  if (list.includes(value)) return;
  if (position === "start") list.unshift(value);
  else list.push(value);
}

function addUniqueOffset(list: string[], offset: string): void {
  if (!list.some((o) => sameOffset(o, offset))) list.push(offset);
}

function ensureSecurity(manifest: FlashManifest): SecurityRecord {
  manifest.security ??= { secure_boot: false, encryption: false, force_offsets: [], read_protected: [] };
  return manifest.security;
}

/**
 * A signed bootloader's header must not be patched by the flashing tool, so any
 * `detect` setting becomes `keep`, both in flash_settings and in write_flash_args.
 */
function disableAutoDetect(manifest: FlashManifest): void {
  for (const [key, value] of Object.entries(manifest.flashSettings)) {
    if (value === "detect") manifest.flashSettings[key] = "keep";
  }
  const args = manifest.writeFlashArgs;
  for (let i = 0; i < args.length - 1; i++) {
    if (FLASH_SETTING_FLAGS.includes(args[i]) && args[i + 1] === "detect") args[i + 1] = "keep";
  }
}

/**
 * Rewrite flashing instructions in place to match the posture. Idempotent: all
 * markers are added with set semantics.
 */
export function rewriteManifest(manifest: FlashManifest, posture: SecurityPosture): FlashManifest {
  const security = ensureSecurity(manifest);
  security.secure_boot = posture.secureBoot;
  security.encryption = posture.encryption;

  const bootloader = findBootloaderEntry(manifest);

  if (posture.secureBoot && bootloader) {
    addUnique(manifest.writeFlashArgs, FORCE_FLAG, "start");
    addUniqueOffset(security.force_offsets, bootloader.offset);
    disableAutoDetect(manifest);
  }

  if (posture.encryption) {
    addUnique(manifest.writeFlashArgs, ENCRYPT_FLAG);

    for (const [name, section] of Object.entries(manifest.sections)) {
      if (name !== "bootloader") section.encrypted = "true";
    }
    for (const entry of manifest.flashFiles) {
      if (bootloader && sameOffset(entry.offset, bootloader.offset)) continue;
      addUniqueOffset(security.read_protected, entry.offset);
    }
  }

  const bootloaderSection = manifest.sections["bootloader"];
  if (bootloaderSection && !posture.encryption) bootloaderSection.encrypted = "false";

  return manifest;
}
