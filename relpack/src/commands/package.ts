import fs from "node:fs";
import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { resolveBuildType } from "../core/identity.js";
import { packageRelease } from "../core/packager.js";
import { findMarkedRoot } from "../core/project-root.js";
import { ConfigurationError } from "../errors.js";
import {
  readProjectDescription,
  releaseNameFromVersion,
  sanitizeReleaseName,
} from "../manifest/project-description.js";
import type { Reporter } from "../output/reporter.js";
import type { BundleCommandResult } from "./build.js";
import { toFailure } from "./failure.js";

export type PackageCommandOpts = {
  buildDir?: string;
  buildType?: string;
  name?: string;
  signingKey?: string;
  outputDir?: string;
  configFile?: string;
  cwd: string;
  env: NodeJS.ProcessEnv;
  reporter: Reporter;
};

/**
 * Package an existing build directory without running the build tool.
 * Without --name the release is named after the build's project_version.
 */
export async function packageBuild(opts: PackageCommandOpts): Promise<BundleCommandResult> {
  try {
    const root = findMarkedRoot(opts.cwd) ?? path.resolve(opts.cwd);
    const config = loadConfig({ projectRoot: root, configFile: opts.configFile, env: opts.env });

    const buildDir = path.resolve(opts.cwd, opts.buildDir ?? path.join(root, config.build_dir));
    if (!fs.existsSync(buildDir) || !fs.statSync(buildDir).isDirectory()) {
      throw new ConfigurationError("config", `Build directory not found: ${buildDir}`, { field: "build_dir", path: buildDir });
    }

    const buildType = resolveBuildType(opts.buildType ?? "release");
    const releaseName = opts.name
      ? sanitizeReleaseName(opts.name)
      : releaseNameFromVersion(readProjectDescription(buildDir).projectVersion);

    // an explicit key is relative to the working directory, the configured one to the project root;
    // dev builds only sign with a key the operator named explicitly
    const signingKey = opts.signingKey
      ? path.resolve(opts.cwd, opts.signingKey)
      : buildType === "release"
        ? path.resolve(root, config.signing_key)
        : undefined;

    const { bundle } = packageRelease(
      Object.freeze({ buildType, releaseName, buildDir }),
      {
        outputDir: path.resolve(opts.cwd, opts.outputDir ?? path.join(root, config.output_dir)),
        signingKeyPath: signingKey,
        flash: config.flash,
        extraFilePatterns: config.bundle.extra_files,
        reporter: opts.reporter,
      },
    );
    return { ok: true, bundlePath: bundle.path, sha256: bundle.sha256, entries: bundle.entries };
  } catch (e: unknown) {
    return toFailure(e);
  }
}
