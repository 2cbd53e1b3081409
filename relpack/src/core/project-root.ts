import fs from "node:fs";
import path from "node:path";
import type { RepoInfo } from "../git/operations.js";

const ROOT_MARKERS = [".git", "CMakeLists.txt"];

/** Nearest directory at or above `start` holding one of the root markers. */
export function findMarkedRoot(start: string, markers: string[] = ROOT_MARKERS): string | null {
  let current = path.resolve(start);
  for (;;) {
    if (markers.some((m) => fs.existsSync(path.join(current, m)))) return current;
    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

/**
 * Project root: the git top-level, else the nearest marked ancestor of `cwd`,
 * else `cwd` itself.
 */
export async function resolveProjectRoot(cwd: string, repo: RepoInfo): Promise<string> {
  const topLevel = await repo.getTopLevel();
  if (topLevel) return path.resolve(topLevel);
  return findMarkedRoot(cwd) ?? path.resolve(cwd);
}
