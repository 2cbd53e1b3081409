import path from "node:path";
import { readBundle, type BundleEntryInfo } from "../bundle/assembler.js";
import { computeSha256, computeSha256FromContent } from "../bundle/checksum.js";
import { toFailure, type CommandFailure } from "./failure.js";

export type InspectResult =
  | { ok: true; path: string; sha256: string; entries: Array<BundleEntryInfo & { mode: string }> }
  | CommandFailure;

/**
 * List the entries of a release bundle, with the checksum of the bundle itself.
 */
export function inspect(opts: { bundlePath: string; cwd: string }): InspectResult {
  try {
    const bundlePath = path.resolve(opts.cwd, opts.bundlePath);
    const entries = readBundle(bundlePath).map((e) => ({
      name: e.name,
      size: e.data.length,
      sha256: computeSha256FromContent(e.data),
      mode: (e.mode ?? 0o644).toString(8).padStart(4, "0"),
    }));
    return { ok: true, path: bundlePath, sha256: computeSha256(bundlePath), entries };
  } catch (e: unknown) {
    return toFailure(e, "bundle");
  }
}
