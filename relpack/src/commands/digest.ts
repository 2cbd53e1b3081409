import fs from "node:fs";
import path from "node:path";
import { deriveDigest } from "../security/digest.js";
import { toFailure, type CommandFailure } from "./failure.js";

export type DigestResult = { ok: true; hex: string; outPath?: string } | CommandFailure;

/** Derive the Secure Boot V2 public key digest of a signing key; optionally write it as raw bytes. */
export function digest(opts: { keyPath: string; outPath?: string; cwd: string }): DigestResult {
  try {
    const bytes = deriveDigest(path.resolve(opts.cwd, opts.keyPath));
    if (opts.outPath) {
      const outPath = path.resolve(opts.cwd, opts.outPath);
      fs.mkdirSync(path.dirname(outPath), { recursive: true });
      fs.writeFileSync(outPath, bytes);
      return { ok: true, hex: bytes.toString("hex"), outPath };
    }
    return { ok: true, hex: bytes.toString("hex") };
  } catch (e: unknown) {
    return toFailure(e);
  }
}
