import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { BuildToolError, ConfigurationError } from "../errors.js";
import type { BuildType } from "../types/descriptor.js";

const pExecFile = promisify(execFile);

const MAX_OUTPUT_BUFFER = 64 * 1024 * 1024;
const OUTPUT_TAIL_CHARS = 4000;

export type BuildRequest = {
  projectRoot: string;
  buildDir: string;
  buildType: BuildType;
  /** SDKCONFIG_DEFAULTS files, relative to the project root. */
  overlays: string[];
};

/** The external firmware build. Implementations throw BuildToolError on failure. */
export interface BuildTool {
  readonly command: string;
  /** Cheap environment checks run before anything is cleaned or built. */
  preflight(): void;
  build(request: BuildRequest): Promise<void>;
}

function tail(text: string): string {
  return text.length > OUTPUT_TAIL_CHARS ? text.slice(-OUTPUT_TAIL_CHARS) : text;
}

/** `idf.py -B <buildDir> [-D SDKCONFIG_DEFAULTS=a;b] build` */
export function idfBuildArgs(request: BuildRequest): string[] {
  const args = ["-B", request.buildDir];
  if (request.overlays.length > 0) args.push("-D", `SDKCONFIG_DEFAULTS=${request.overlays.join(";")}`);
  args.push("build");
  return args;
}

export class IdfBuildTool implements BuildTool {
  constructor(
    readonly command: string,
    private readonly env: NodeJS.ProcessEnv,
  ) {}

  preflight(): void {
    if (!this.env["IDF_PATH"]) {
      throw new ConfigurationError(
        "validate_inputs",
        "ESP-IDF environment is not sourced (IDF_PATH is unset); source export.sh before building",
        { field: "IDF_PATH" },
      );
    }
  }

  async build(request: BuildRequest): Promise<void> {
    try {
      await pExecFile(this.command, idfBuildArgs(request), {
        cwd: request.projectRoot,
        env: this.env,
        maxBuffer: MAX_OUTPUT_BUFFER,
      });
    } catch (e: unknown) {
      const exitCode = e instanceof Error && "code" in e && typeof e.code === "number" ? e.code : null;
      const stderr = e instanceof Error && "stderr" in e && typeof e.stderr === "string" ? e.stderr : "";
      const output = stderr || (e instanceof Error ? e.message : String(e));
      throw new BuildToolError(this.command, exitCode, tail(output));
    }
  }
}
