import { sameOffset } from "../manifest/flash-manifest.js";
import type { FlashEntry, FlashManifest, SecurityPosture } from "../types/manifest.js";

export const FLASH_SCRIPT_FILE = "flash.sh";

export type FlashScriptOptions = {
  projectName: string;
  releaseName: string;
  defaultPort: string;
  baud: number;
};

/** Printed immediately before every forced bootloader write. */
export const FORCE_WARNING =
  "WARNING: writing the signed bootloader with --force. Secure Boot refuses writes below 0x8000 without it; a wrong bootloader image will permanently brick this device.";

/** Single-quote a value for bash. */
export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_./:=@%+-]+$/.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function confirmBlock(variable: string, question: string): string[] {
  return [
    `read -r -p ${shellQuote(`${question} (y/N): `)} ${variable}`,
    `if [[ ! $${variable} =~ ^[Yy]$ ]]; then`,
    `  echo "Flashing aborted."`,
    `  exit 1`,
    `fi`,
  ];
}

function echo(text: string): string {
  return `echo ${shellQuote(text)}`;
}

function esptoolCommand(manifest: FlashManifest, posture: SecurityPosture, entry: FlashEntry, force: boolean): string {
  const extra = manifest.extraEsptoolArgs;
  const settings = manifest.flashSettings;

  const parts = ["esptool.py", "-p", `"$PORT"`, "-b", `"$BAUD"`];
  parts.push("--before", shellQuote(extra.before ?? "default_reset"));
  parts.push("--after", shellQuote(extra.after ?? "hard_reset"));
  if (extra.stub === false) parts.push("--no-stub");
  parts.push("--chip", shellQuote(extra.chip ?? "auto"));

  parts.push("write_flash");
  if (settings.flash_mode) parts.push("--flash_mode", shellQuote(settings.flash_mode));
  if (settings.flash_freq) parts.push("--flash_freq", shellQuote(settings.flash_freq));
  if (settings.flash_size) parts.push("--flash_size", shellQuote(settings.flash_size));
  if (force) parts.push("--force");
  if (posture.encryption) parts.push("--encrypt");

  parts.push(shellQuote(entry.offset), shellQuote(entry.file));
  return parts.join(" ");
}

/**
 * Generate a standalone bash script that flashes every manifest entry, in
 * manifest order, from the directory the bundle was unpacked into. The only
 * input the operator gives is an optional serial port argument.
 */
export function generateFlashScript(manifest: FlashManifest, posture: SecurityPosture, opts: FlashScriptOptions): string {
  const forced = manifest.security?.force_offsets ?? [];
  const title = `${opts.projectName} ${opts.releaseName}`.replace(/[\r\n]+/g, " ");

  const lines: string[] = [
    "#!/usr/bin/env bash",
    `# Flash script for release ${title}`,
    "# Usage: ./flash.sh [serial-port]",
    "set -euo pipefail",
    "",
    `DEFAULT_PORT=${shellQuote(opts.defaultPort)}`,
    `PORT="\${1:-$DEFAULT_PORT}"`,
    `BAUD=${opts.baud}`,
    `cd "$(dirname "$0")"`,
    "",
    `echo ${shellQuote(`Flashing ${title} to`)} "$PORT"`,
  ];

  if (posture.encryption) {
    lines.push(
      "",
      echo("WARNING: Flash encryption is enabled for this release."),
      echo("  - Firmware is encrypted as it is written to flash and cannot be read back in plaintext."),
      echo("  - Later updates must be made with the same encryption key provisioning."),
      echo("  - Without the correct key provisioning the device becomes unreadable and unrecoverable."),
      ...confirmBlock("CONFIRM_ENCRYPT", "Continue flashing with encryption?"),
    );
  }

  if (posture.secureBoot) {
    lines.push(
      "",
      echo("WARNING: Secure Boot is enabled for this release."),
      echo("  - Secure Boot blocks writes below 0x8000 unless --force is given."),
      echo("  - The signed bootloader is written with --force; misuse of --force can lock the device permanently."),
      ...confirmBlock("CONFIRM_SECURE_BOOT", "Continue flashing with Secure Boot enabled?"),
    );
  }

  lines.push("");
  for (const entry of manifest.flashFiles) {
    const force = posture.secureBoot && forced.some((o) => sameOffset(o, entry.offset));
    if (force) lines.push(echo(FORCE_WARNING));
    lines.push(esptoolCommand(manifest, posture, entry, force));
  }

  lines.push("", echo(`Flashing ${title} complete.`), "");
  return lines.join("\n");
}
