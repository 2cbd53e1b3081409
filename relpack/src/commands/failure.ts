import { ReleaseError, isReleaseError } from "../errors.js";
import type { Diagnostic } from "../output/reporter.js";
import { EXIT, exitCodeFor, type ExitCode } from "./exit-codes.js";

export type CommandFailure = {
  ok: false;
  stage: string;
  error: ReleaseError;
  exitCode: ExitCode;
};

export function toFailure(e: unknown, stage?: string): CommandFailure {
  const error = isReleaseError(e)
    ? e
    : new ReleaseError(e instanceof Error ? e.message : String(e), "UNEXPECTED", "config");
  return {
    ok: false,
    stage: stage ?? error.stage,
    error,
    exitCode: isReleaseError(e) ? exitCodeFor(e) : EXIT.UNEXPECTED,
  };
}

/** `failed at <stage>: <message>`, with the error's path/field details attached. */
export function failureDiagnostic(failure: CommandFailure): Diagnostic {
  const { error, stage } = failure;
  const inner = error.stage !== stage ? ` (${error.stage})` : "";
  return {
    level: "error",
    code: error.code,
    stage,
    message: `failed at ${stage}${inner}: ${error.message}`,
    ...(error.details ? { details: error.details } : {}),
  };
}
