import { BuildToolError, ConfigurationError, KeyError, ManifestError, MissingArtifactError } from "../errors.js";

/**
 * CLI exit codes. Each error kind has its own code so CI can tell them apart.
 */
export const EXIT = {
  SUCCESS: 0,
  UNEXPECTED: 1,
  CONFIGURATION: 2,
  KEY: 3,
  MANIFEST: 4,
  MISSING_ARTIFACT: 5,
  BUILD_TOOL: 6,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigurationError) return EXIT.CONFIGURATION;
  if (error instanceof KeyError) return EXIT.KEY;
  if (error instanceof ManifestError) return EXIT.MANIFEST;
  if (error instanceof MissingArtifactError) return EXIT.MISSING_ARTIFACT;
  if (error instanceof BuildToolError) return EXIT.BUILD_TOOL;
  return EXIT.UNEXPECTED;
}
