import { ConfigurationError } from "../errors.js";
import type { RepoInfo } from "../git/operations.js";
import { sanitizeReleaseName } from "../manifest/project-description.js";
import { BUILD_TYPES, isBuildType, type BuildType } from "../types/descriptor.js";

export type ReleaseNameSource = "explicit" | "tag" | "commit" | "fallback";

export type ResolvedName = {
  name: string;
  source: ReleaseNameSource;
};

export const FALLBACK_RELEASE_NAME = "latest";

export function resolveBuildType(value: unknown): BuildType {
  if (isBuildType(value)) return value;
  const shown = value === undefined || value === "" ? "(none)" : String(value);
  throw new ConfigurationError("resolve_identity", `Invalid build type ${shown}; use one of: ${BUILD_TYPES.join(", ")}`, {
    field: "type",
  });
}

/**
 * Release name: explicit name, else a tag exactly at HEAD, else the short
 * commit id. The first source that yields a name wins. Outside a repository
 * with no explicit name the release is called "latest".
 */
export async function resolveReleaseName(explicitName: string | undefined, repo: RepoInfo): Promise<ResolvedName> {
  if (explicitName !== undefined && explicitName.trim().length > 0) {
    return { name: sanitizeReleaseName(explicitName), source: "explicit" };
  }

  const tags = [...(await repo.getTagsAtHead())].sort();
  if (tags.length > 0) return { name: sanitizeReleaseName(tags[0]), source: "tag" };

  const sha = await repo.getShortSha();
  if (sha) return { name: sha, source: "commit" };

  return { name: FALLBACK_RELEASE_NAME, source: "fallback" };
}
