import fs from "node:fs";
import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { ConfigurationError, ReleaseError, isReleaseError } from "../errors.js";
import type { RepoInfo } from "../git/operations.js";
import type { Reporter } from "../output/reporter.js";
import type { RelpackConfig } from "../types/config.js";
import type { BuildDescriptor } from "../types/descriptor.js";
import type { BuildTool } from "./build-tool.js";
import { resolveBuildType, resolveReleaseName } from "./identity.js";
import { packageRelease, type PackageResult } from "./packager.js";
import { resolveProjectRoot } from "./project-root.js";
import { INITIAL_STATUS, nextState, type OrchestratorStage, type OrchestratorStatus } from "./state-machine.js";

export type StageRecord = {
  stage: OrchestratorStage;
  status: "success" | "failed";
  duration_ms: number;
  error?: string;
};

export type BuildOptions = {
  /** Unvalidated; checked in resolve_identity. */
  buildType: string | undefined;
  releaseName?: string;
  buildDir?: string;
  signingKey?: string;
  outputDir?: string;
  configFile?: string;
};

export type OrchestratorResult =
  | {
      ok: true;
      status: "done";
      descriptor: BuildDescriptor;
      result: PackageResult;
      stages: StageRecord[];
    }
  | {
      ok: false;
      status: OrchestratorStatus;
      stage: OrchestratorStage;
      error: ReleaseError;
      stages: StageRecord[];
    };

export type OrchestratorDeps = {
  repo: RepoInfo;
  /** Called once the configuration is known. */
  createBuildTool: (config: RelpackConfig) => BuildTool;
  reporter: Reporter;
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Directory holding base.yaml; defaults to the package's own config/. */
  defaultsDir?: string;
};

function toReleaseError(e: unknown, stage: OrchestratorStage): ReleaseError {
  if (isReleaseError(e)) return e;
  const message = e instanceof Error ? e.message : String(e);
  return new ReleaseError(message, "UNEXPECTED", stage);
}

function isSameOrAncestor(candidate: string, of: string): boolean {
  const rel = path.relative(candidate, of);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

/**
 * Resolves the build's identity and inputs, runs the external build, then the
 * packager. Each stage runs once, in order, and the first failure ends the run
 * with `failed_<stage>`.
 */
export class BuildOrchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  async run(opts: BuildOptions): Promise<OrchestratorResult> {
    const { repo, reporter, cwd, env } = this.deps;
    const stages: StageRecord[] = [];
    let status: OrchestratorStatus = INITIAL_STATUS;

    const stage = async <T>(name: OrchestratorStage, fn: () => Promise<T> | T): Promise<T> => {
      if (status !== name) throw new Error(`Stage ${name} cannot run while pipeline is at ${status}`);
      const started = Date.now();
      try {
        const value = await fn();
        stages.push({ stage: name, status: "success", duration_ms: Date.now() - started });
        status = nextState(name, "success");
        return value;
      } catch (e: unknown) {
        const error = toReleaseError(e, name);
        stages.push({ stage: name, status: "failed", duration_ms: Date.now() - started, error: error.message });
        status = nextState(name, "failure");
        throw error;
      }
    };

    let current: OrchestratorStage = "resolve_root";
    try {
      const { root, config, buildTool } = await stage("resolve_root", async () => {
        const root = await resolveProjectRoot(cwd, repo);
        const config = loadConfig({ projectRoot: root, configFile: opts.configFile, env, defaultsDir: this.deps.defaultsDir });
        reporter.info("PROJECT_ROOT", `Detected project root: ${root}`, { root });
        return { root, config, buildTool: this.deps.createBuildTool(config) };
      });

      current = "resolve_identity";
      const descriptor = await stage("resolve_identity", async (): Promise<BuildDescriptor> => {
        const buildType = resolveBuildType(opts.buildType);
        const { name, source } = await resolveReleaseName(opts.releaseName, repo);
        const buildDir = path.resolve(root, opts.buildDir ?? config.build_dir);
        reporter.info("IDENTITY", `Starting ${buildType.toUpperCase()} build ${name} (name from ${source})`, {
          build_type: buildType,
          release_name: name,
          build_dir: buildDir,
        });
        return Object.freeze({ buildType, releaseName: name, buildDir });
      });

      // dev builds only sign with a key the operator named explicitly
      const signingKey =
        descriptor.buildType === "release"
          ? path.resolve(root, opts.signingKey ?? config.signing_key)
          : opts.signingKey
            ? path.resolve(root, opts.signingKey)
            : undefined;

      current = "validate_inputs";
      await stage("validate_inputs", () => this.validateInputs(root, descriptor, config, buildTool, signingKey));

      current = "clean_previous_build";
      await stage("clean_previous_build", () => this.clean(root, descriptor.buildDir));

      current = "invoke_build_tool";
      await stage("invoke_build_tool", async () => {
        reporter.info("BUILD", `Building with ${buildTool.command} into ${descriptor.buildDir}`);
        await buildTool.build({
          projectRoot: root,
          buildDir: descriptor.buildDir,
          buildType: descriptor.buildType,
          overlays: config.build_tool.overlays[descriptor.buildType],
        });
      });

      current = "invoke_packager";
      const result = await stage("invoke_packager", () =>
        packageRelease(descriptor, {
          outputDir: path.resolve(root, opts.outputDir ?? config.output_dir),
          signingKeyPath: signingKey,
          flash: config.flash,
          extraFilePatterns: config.bundle.extra_files,
          reporter,
        }),
      );

      return { ok: true, status: "done", descriptor, result, stages };
    } catch (e: unknown) {
      return { ok: false, status, stage: current, error: toReleaseError(e, current), stages };
    }
  }

  private validateInputs(
    root: string,
    descriptor: BuildDescriptor,
    config: RelpackConfig,
    buildTool: BuildTool,
    signingKey: string | undefined,
  ): void {
    if (descriptor.buildType === "release") {
      if (!signingKey || !fs.existsSync(signingKey) || !fs.statSync(signingKey).isFile()) {
        throw new ConfigurationError("validate_inputs", `Signing key not found: ${signingKey ?? "(none)"}`, {
          field: "signing_key",
          path: signingKey ?? null,
        });
      }
      this.deps.reporter.info("SIGNING_KEY", `Using signing key: ${signingKey}`);
    } else if (signingKey && !fs.existsSync(signingKey)) {
      this.deps.reporter.warn("SIGNING_KEY_MISSING", `Signing key ${signingKey} not found; dev build will not use Secure Boot`);
    }

    for (const overlay of config.build_tool.overlays[descriptor.buildType]) {
      const overlayPath = path.resolve(root, overlay);
      if (!fs.existsSync(overlayPath)) {
        throw new ConfigurationError("validate_inputs", `Config overlay not found: ${overlayPath}`, {
          field: `build_tool.overlays.${descriptor.buildType}`,
          path: overlayPath,
        });
      }
    }

    if (isSameOrAncestor(descriptor.buildDir, root)) {
      throw new ConfigurationError("validate_inputs", `Build directory ${descriptor.buildDir} contains the project root`, {
        field: "build_dir",
        path: descriptor.buildDir,
      });
    }

    // clean_previous_build removes the build directory; nothing it deletes may be an input
    const inputs = [
      ...(signingKey ? [{ what: "signing key", path: signingKey }] : []),
      ...config.build_tool.overlays[descriptor.buildType].map((o) => ({ what: "config overlay", path: path.resolve(root, o) })),
    ];
    for (const input of inputs) {
      if (isSameOrAncestor(descriptor.buildDir, input.path)) {
        throw new ConfigurationError(
          "validate_inputs",
          `Build directory ${descriptor.buildDir} contains the ${input.what} ${input.path}; it would be deleted by the clean step`,
          { field: "build_dir", path: descriptor.buildDir },
        );
      }
    }

    buildTool.preflight();
  }

  private clean(root: string, buildDir: string): void {
    const sdkconfig = path.join(root, "sdkconfig");
    if (fs.existsSync(sdkconfig)) {
      this.deps.reporter.info("CLEAN", `Removing old ${sdkconfig}`);
      fs.rmSync(sdkconfig, { force: true });
    }
    if (fs.existsSync(buildDir)) {
      this.deps.reporter.info("CLEAN", `Removing old build directory: ${buildDir}`);
      fs.rmSync(buildDir, { recursive: true, force: true });
    }
    fs.mkdirSync(buildDir, { recursive: true });
  }
}
