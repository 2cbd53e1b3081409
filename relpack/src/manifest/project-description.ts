import fs from "node:fs";
import path from "node:path";
import { ManifestError } from "../errors.js";
import { firstErrorField, loadAjv } from "../schema/ajv.js";
import { PROJECT_DESCRIPTION_SCHEMA, type RawProjectDescription } from "./schema.js";

export const PROJECT_DESCRIPTION_FILE = "project_description.json";

export type ProjectInfo = {
  projectName: string;
  projectVersion: string;
};

/** Read project name and version from the build tool's project_description.json. */
export function readProjectDescription(buildDir: string): ProjectInfo {
  const filePath = path.join(buildDir, PROJECT_DESCRIPTION_FILE);
  if (!fs.existsSync(filePath)) {
    throw new ManifestError(PROJECT_DESCRIPTION_FILE, `${PROJECT_DESCRIPTION_FILE} not found in ${buildDir}`, {
      path: filePath,
    });
  }

  let doc: unknown;
  try {
    doc = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e: unknown) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ManifestError(PROJECT_DESCRIPTION_FILE, `${filePath} is not valid JSON: ${reason}`, { path: filePath });
  }

  const validate = loadAjv().compile<RawProjectDescription>(PROJECT_DESCRIPTION_SCHEMA);
  if (!validate(doc)) {
    const field = firstErrorField(validate.errors);
    throw new ManifestError(field, `${filePath}: invalid field '${field}'`, { path: filePath });
  }

  return {
    projectName: doc.project_name || "unknown_project",
    projectVersion: doc.project_version ?? "0.0.0",
  };
}

/**
 * Release name used when nobody supplied one: the build's version string with a
 * trailing `-dirty` removed (tag, commits-ahead and sha are kept), else "latest".
 */
export function releaseNameFromVersion(projectVersion: string): string {
  const cleaned = projectVersion.trim().replace(/-dirty$/, "");
  return cleaned.length > 0 ? cleaned : "latest";
}

/** Spaces and path separators become underscores so the name is a single path segment. */
export function sanitizeReleaseName(name: string): string {
  return name.trim().replace(/[\s/\\]+/g, "_");
}

/** `<project>_<release>.tar.gz` */
export function bundleFileName(projectName: string, releaseName: string): string {
  return `${sanitizeReleaseName(projectName)}_${sanitizeReleaseName(releaseName)}.tar.gz`;
}
