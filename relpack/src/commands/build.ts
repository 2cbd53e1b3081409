import { IdfBuildTool, type BuildTool } from "../core/build-tool.js";
import { BuildOrchestrator, type BuildOptions } from "../core/orchestrator.js";
import { GitOperations, type RepoInfo } from "../git/operations.js";
import type { Reporter } from "../output/reporter.js";
import type { RelpackConfig } from "../types/config.js";
import type { BundleEntryInfo } from "../bundle/assembler.js";
import { toFailure, type CommandFailure } from "./failure.js";

export type BuildCommandOpts = BuildOptions & {
  cwd: string;
  env: NodeJS.ProcessEnv;
  reporter: Reporter;
  repo?: RepoInfo;
  createBuildTool?: (config: RelpackConfig) => BuildTool;
};

export type BundleCommandResult =
  | { ok: true; bundlePath: string; sha256: string; entries: BundleEntryInfo[] }
  | CommandFailure;

/**
 * Full pipeline: build with the external tool, then package.
 */
export async function build(opts: BuildCommandOpts): Promise<BundleCommandResult> {
  const orchestrator = new BuildOrchestrator({
    repo: opts.repo ?? new GitOperations(opts.cwd),
    createBuildTool: opts.createBuildTool ?? ((config) => new IdfBuildTool(config.build_tool.command, opts.env)),
    reporter: opts.reporter,
    cwd: opts.cwd,
    env: opts.env,
  });

  const res = await orchestrator.run(opts);
  if (!res.ok) return toFailure(res.error, res.stage);

  const { bundle } = res.result;
  return { ok: true, bundlePath: bundle.path, sha256: bundle.sha256, entries: bundle.entries };
}
