/**
 * Typed pipeline failures. Every error names the stage that raised it and the
 * offending path or field, so the CLI can report it without a stack trace.
 */

export type PipelineStage =
  | "config"
  | "resolve_root"
  | "resolve_identity"
  | "validate_inputs"
  | "clean_previous_build"
  | "invoke_build_tool"
  | "invoke_packager"
  | "manifest"
  | "classify"
  | "rewrite"
  | "digest"
  | "script"
  | "bundle";

export class ReleaseError extends Error {
  public readonly code: string;
  public readonly stage: PipelineStage;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, stage: PipelineStage, details?: Record<string, unknown>) {
    super(message);
    this.name = "ReleaseError";
    this.code = code;
    this.stage = stage;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

/** Invalid or missing build type, or a release build without its signing key. */
export class ConfigurationError extends ReleaseError {
  constructor(stage: PipelineStage, message: string, details?: Record<string, unknown>) {
    super(message, "CONFIGURATION_ERROR", stage, details);
    this.name = "ConfigurationError";
  }
}

export type KeyErrorReason = "missing" | "unreadable" | "malformed" | "unsupported";

/**
 * The signing key could not be used. `missing` and `unreadable` are about the
 * file; `malformed` and `unsupported` are about its contents.
 */
export class KeyError extends ReleaseError {
  public readonly reason: KeyErrorReason;
  public readonly keyPath: string;

  constructor(keyPath: string, reason: KeyErrorReason, message: string) {
    super(message, "KEY_ERROR", "digest", { path: keyPath, reason });
    this.name = "KeyError";
    this.reason = reason;
    this.keyPath = keyPath;
  }
}

export class ManifestError extends ReleaseError {
  public readonly field: string;

  constructor(field: string, message: string, details?: Record<string, unknown>) {
    super(message, "MANIFEST_ERROR", "manifest", { field, ...details });
    this.name = "ManifestError";
    this.field = field;
  }
}

export class MissingArtifactError extends ReleaseError {
  public readonly path: string;

  constructor(artifactPath: string) {
    super(`Referenced artifact not found: ${artifactPath}`, "MISSING_ARTIFACT", "bundle", { path: artifactPath });
    this.name = "MissingArtifactError";
    this.path = artifactPath;
  }
}

export class BuildToolError extends ReleaseError {
  public readonly exitCode: number | null;

  constructor(command: string, exitCode: number | null, output: string) {
    super(
      `Build tool '${command}' failed${exitCode === null ? "" : ` with exit code ${exitCode}`}`,
      "BUILD_TOOL_ERROR",
      "invoke_build_tool",
      { command, exitCode, output },
    );
    this.name = "BuildToolError";
    this.exitCode = exitCode;
  }
}

export function isReleaseError(err: unknown): err is ReleaseError {
  return err instanceof ReleaseError;
}
