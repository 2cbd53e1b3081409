import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import zlib from "node:zlib";
import { minimatch } from "minimatch";
import { ConfigurationError, ManifestError, MissingArtifactError, ReleaseError } from "../errors.js";
import { FLASHER_ARGS_FILE, parseFlashManifest, serializeFlashManifest } from "../manifest/flash-manifest.js";
import { FLASH_SCRIPT_FILE } from "../script/flash-script.js";
import { DIGEST_FILE } from "../security/digest.js";
import type { FlashManifest } from "../types/manifest.js";
import { computeSha256FromContent } from "./checksum.js";
import { extract, pack, type TarEntry } from "./tar.js";

const RESERVED_NAMES = [FLASHER_ARGS_FILE, FLASH_SCRIPT_FILE, DIGEST_FILE];

export type BundleInput = {
  buildDir: string;
  outputPath: string;
  manifest: FlashManifest;
  script: string;
  digest?: Buffer;
  /** Build-directory relative paths shipped in addition to the manifest's binaries. */
  extraFiles?: string[];
  /** No bundled file may resolve to this path. */
  signingKeyPath?: string;
};

export type BundleEntryInfo = {
  name: string;
  size: number;
  sha256: string;
};

export type BundleResult = {
  path: string;
  sha256: string;
  entries: BundleEntryInfo[];
};

function toArchiveName(file: string): string {
  return path.posix.normalize(file.split(path.sep).join("/"));
}

function isWithinDir(rootDir: string, candidatePath: string): boolean {
  const rel = path.relative(rootDir, candidatePath);
  return rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
}

/** Build-dir relative files matching any of the glob patterns, sorted. Names the bundle generates are skipped. */
export function collectExtraFiles(buildDir: string, patterns: string[]): string[] {
  if (patterns.length === 0 || !fs.existsSync(buildDir)) return [];
  const all = fs.readdirSync(buildDir, { recursive: true, encoding: "utf8" });
  return all
    .map(toArchiveName)
    .filter((rel) => !RESERVED_NAMES.includes(rel))
    .filter((rel) => patterns.some((p) => minimatch(rel, p)))
    .filter((rel) => fs.statSync(path.join(buildDir, rel)).isFile())
    .sort();
}

type BundleSource = {
  file: string;
  /** Where the path came from, reported on rejection. */
  field: "flash_files" | "bundle.extra_files";
};

function realPathOf(filePath: string): string | undefined {
  try {
    return fs.realpathSync(filePath);
  } catch {
    return undefined;
  }
}

/** True when `absPath` is the signing key itself or a byte-for-byte copy of it. */
function isSigningKey(absPath: string, key: { realPath: string; data: Buffer }): boolean {
  if (realPathOf(absPath) === key.realPath) return true;
  if (fs.statSync(absPath).size !== key.data.length) return false;
  const data = fs.readFileSync(absPath);
  try {
    return crypto.timingSafeEqual(data, key.data);
  } finally {
    data.fill(0);
  }
}

/**
 * Resolve every file the bundle will carry, failing on the first one that is
 * missing, escapes the build directory or is the signing key. Runs before
 * anything is written.
 */
function resolveBinaries(
  buildDir: string,
  sources: BundleSource[],
  signingKeyPath: string | undefined,
): Array<{ name: string; absPath: string }> {
  const root = path.resolve(buildDir);
  const keyRealPath = signingKeyPath ? realPathOf(signingKeyPath) : undefined;
  const key =
    keyRealPath !== undefined && fs.statSync(keyRealPath).isFile()
      ? { realPath: keyRealPath, data: fs.readFileSync(keyRealPath) }
      : undefined;
  const seen = new Set<string>();
  const resolved: Array<{ name: string; absPath: string }> = [];

  try {
    for (const { file, field } of sources) {
      const name = toArchiveName(file);
      if (seen.has(name)) continue;
      seen.add(name);

      const absPath = path.resolve(root, file);
      if (!isWithinDir(root, absPath) || RESERVED_NAMES.includes(name)) {
        throw new ManifestError(field, `Bundle file '${file}' from ${field} is not a valid build-directory path`, {
          path: file,
        });
      }
      if (!fs.existsSync(absPath) || !fs.statSync(absPath).isFile()) {
        throw new MissingArtifactError(absPath);
      }
      if (key && isSigningKey(absPath, key)) {
        throw new ConfigurationError("bundle", `Refusing to bundle the signing key: '${file}' from ${field} matches ${signingKeyPath}`, {
          field,
          path: absPath,
        });
      }
      resolved.push({ name, absPath });
    }
  } finally {
    key?.data.fill(0);
  }
  return resolved;
}

function readBinary(absPath: string): Buffer {
  try {
    return fs.readFileSync(absPath);
  } catch {
    throw new MissingArtifactError(absPath);
  }
}

/**
 * Assemble the release archive: flasher_args.json, flash.sh, digest.bin (when
 * given) and every referenced binary. The archive is written next to the
 * target under a temporary name and renamed into place, so the target path
 * holds either the complete bundle or whatever was there before.
 */
export function assembleBundle(input: BundleInput): BundleResult {
  const binaries = resolveBinaries(
    input.buildDir,
    [
      ...input.manifest.flashFiles.map((e): BundleSource => ({ file: e.file, field: "flash_files" })),
      ...(input.extraFiles ?? []).map((file): BundleSource => ({ file, field: "bundle.extra_files" })),
    ],
    input.signingKeyPath,
  );

  const entries: TarEntry[] = [
    { name: FLASHER_ARGS_FILE, data: Buffer.from(serializeFlashManifest(input.manifest), "utf8") },
    { name: FLASH_SCRIPT_FILE, data: Buffer.from(input.script, "utf8"), mode: 0o755 },
  ];
  if (input.digest) entries.push({ name: DIGEST_FILE, data: Buffer.from(input.digest) });
  for (const bin of binaries) {
    entries.push({ name: bin.name, data: readBinary(bin.absPath) });
  }

  const archive = zlib.gzipSync(pack(entries), { level: 9 });

  const outputPath = path.resolve(input.outputPath);
  const tmpPath = `${outputPath}.${process.pid}.${crypto.randomBytes(4).toString("hex")}.tmp`;
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  try {
    fs.writeFileSync(tmpPath, archive);
    fs.renameSync(tmpPath, outputPath);
  } catch (e: unknown) {
    fs.rmSync(tmpPath, { force: true });
    const reason = e instanceof Error ? e.message : String(e);
    throw new ReleaseError(`Could not write bundle ${outputPath}: ${reason}`, "BUNDLE_WRITE_FAILED", "bundle", {
      path: outputPath,
    });
  }

  return {
    path: outputPath,
    sha256: computeSha256FromContent(archive),
    entries: entries.map((e) => ({ name: e.name, size: e.data.length, sha256: computeSha256FromContent(e.data) })),
  };
}

/** Unpack a bundle into memory. */
export function readBundle(bundlePath: string): TarEntry[] {
  if (!fs.existsSync(bundlePath)) throw new MissingArtifactError(bundlePath);
  return extract(zlib.gunzipSync(fs.readFileSync(bundlePath)));
}

/** Re-read the flashing metadata a bundle carries. */
export function readBundleManifest(bundlePath: string): FlashManifest {
  const entry = readBundle(bundlePath).find((e) => e.name === FLASHER_ARGS_FILE);
  if (!entry) throw new ManifestError(FLASHER_ARGS_FILE, `${bundlePath} has no ${FLASHER_ARGS_FILE}`, { path: bundlePath });
  return parseFlashManifest(JSON.parse(entry.data.toString("utf8")), `${bundlePath}:${FLASHER_ARGS_FILE}`);
}
