import crypto from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

export const FLASH_FILES: Record<string, string> = {
  "0x1000": "bootloader/bootloader.bin",
  "0x8000": "partition_table/partition-table.bin",
  "0xd000": "ota_data_initial.bin",
  "0x10000": "app.bin",
};

/** flasher_args.json shaped like the one the build tool writes for a plain ESP32 app. */
export function flasherArgs(): Record<string, unknown> {
  return {
    write_flash_args: ["--flash_mode", "dio", "--flash_size", "detect", "--flash_freq", "80m"],
    flash_settings: { flash_mode: "dio", flash_size: "detect", flash_freq: "80m" },
    flash_files: { ...FLASH_FILES },
    bootloader: { offset: "0x1000", file: "bootloader/bootloader.bin", encrypted: "false" },
    app: { offset: "0x10000", file: "app.bin", encrypted: "false" },
    "partition-table": { offset: "0x8000", file: "partition_table/partition-table.bin", encrypted: "false" },
    otadata: { offset: "0xd000", file: "ota_data_initial.bin", encrypted: "false" },
    extra_esptool_args: { after: "hard_reset", before: "default_reset", stub: true, chip: "esp32" },
  };
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `relpack-${prefix}-`));
}

export type BuildDirOptions = {
  args?: Record<string, unknown>;
  projectName?: string;
  projectVersion?: string;
  /** Flash files to leave out of the build directory. */
  skipFiles?: string[];
};

/** Populate a build directory with the manifest, project description and every binary it names. */
export function writeBuildDir(buildDir: string, opts: BuildDirOptions = {}): void {
  const args = opts.args ?? flasherArgs();
  fs.mkdirSync(buildDir, { recursive: true });
  fs.writeFileSync(path.join(buildDir, "flasher_args.json"), JSON.stringify(args, null, 2));
  fs.writeFileSync(
    path.join(buildDir, "project_description.json"),
    JSON.stringify({
      project_name: opts.projectName ?? "demo",
      project_version: opts.projectVersion ?? "v1.0.0",
      target: "esp32",
    }),
  );

  const files = args["flash_files"];
  if (typeof files !== "object" || files === null) return;
  for (const file of Object.values(files)) {
    if (typeof file !== "string" || opts.skipFiles?.includes(file)) continue;
    const abs = path.join(buildDir, file);
    fs.mkdirSync(path.dirname(abs), { recursive: true });
    fs.writeFileSync(abs, Buffer.from(`binary:${file}`));
  }
}

export function writeEcKey(keyPath: string, namedCurve = "prime256v1"): void {
  const { privateKey } = crypto.generateKeyPairSync("ec", { namedCurve });
  fs.mkdirSync(path.dirname(keyPath), { recursive: true });
  fs.writeFileSync(keyPath, privateKey.export({ format: "pem", type: "pkcs8" }));
}
