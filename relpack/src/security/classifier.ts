import fs from "node:fs";
import { ConfigurationError } from "../errors.js";
import { findBootloaderEntry } from "../manifest/flash-manifest.js";
import type { BuildType } from "../types/descriptor.js";
import type { FlashManifest, SecurityPosture } from "../types/manifest.js";

export const ENCRYPT_FLAG = "--encrypt";

export type ClassificationInput = {
  buildType: BuildType;
  /** Only a key the caller means to use; dev callers pass one only when the operator named it. */
  signingKeyPath?: string;
};

/** Whether the build tool already asked for flash encryption. */
export function manifestFlagsEncryption(manifest: FlashManifest): boolean {
  if (manifest.writeFlashArgs.includes(ENCRYPT_FLAG)) return true;
  return manifest.sections["app"]?.encrypted === "true";
}

function keyAvailable(keyPath: string | undefined): keyPath is string {
  return keyPath !== undefined && keyPath.trim().length > 0 && fs.existsSync(keyPath) && fs.statSync(keyPath).isFile();
}

/**
 * Derive the security posture of a build. Read-only over the manifest.
 *
 * secure boot: the manifest carries a bootloader entry and a usable signing key was supplied.
 * encryption: the manifest already flags it, or a release build with secure boot.
 *
 * A release build whose manifest carries a bootloader must not fall back to an
 * unsigned bootloader, so a missing key is a ConfigurationError there.
 */
export function classifyPosture(manifest: FlashManifest, input: ClassificationInput): SecurityPosture {
  const bootloader = findBootloaderEntry(manifest);
  const hasKey = keyAvailable(input.signingKeyPath);

  if (bootloader && !hasKey && input.buildType === "release") {
    const where = input.signingKeyPath ? `'${input.signingKeyPath}' does not exist` : "none was supplied";
    throw new ConfigurationError(
      "classify",
      `Release build flashes a bootloader at ${bootloader.offset} but no signing key is available (${where})`,
      { field: "signing_key", path: input.signingKeyPath ?? null },
    );
  }

  const secureBoot = bootloader !== undefined && hasKey;
  const encryption = manifestFlagsEncryption(manifest) || (input.buildType === "release" && secureBoot);

  return { secureBoot, encryption };
}
