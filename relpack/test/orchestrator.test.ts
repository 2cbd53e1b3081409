import { describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { readBundle, readBundleManifest } from "../src/bundle/assembler.js";
import { exitCodeFor } from "../src/commands/exit-codes.js";
import type { BuildRequest, BuildTool } from "../src/core/build-tool.js";
import { BuildOrchestrator, type OrchestratorResult } from "../src/core/orchestrator.js";
import { BuildToolError, ConfigurationError, MissingArtifactError } from "../src/errors.js";
import type { RepoInfo } from "../src/git/operations.js";
import { createMemoryReporter } from "../src/output/reporter.js";
import { FORCE_WARNING } from "../src/script/flash-script.js";
import { deriveDigest } from "../src/security/digest.js";
import { makeTempDir, writeBuildDir, writeEcKey, type BuildDirOptions } from "./helpers.js";

class FakeBuildTool implements BuildTool {
  readonly command = "fake-idf";
  readonly requests: BuildRequest[] = [];

  constructor(
    private readonly output: BuildDirOptions = {},
    private readonly failWith?: Error,
  ) {}

  preflight(): void {}

  async build(request: BuildRequest): Promise<void> {
    this.requests.push(request);
    if (this.failWith) throw this.failWith;
    writeBuildDir(request.buildDir, this.output);
  }
}

function makeProject(): { root: string; keyPath: string } {
  const root = makeTempDir("project");
  fs.writeFileSync(path.join(root, "CMakeLists.txt"), "project(demo)\n");
  fs.writeFileSync(path.join(root, "sdkconfig.defaults"), "CONFIG_A=y\n");
  fs.writeFileSync(path.join(root, "sdkconfig.release"), "CONFIG_SECURE_BOOT=y\n");
  const keyPath = path.join(root, "keys", "secure_boot_signing_key.pem");
  writeEcKey(keyPath);
  return { root, keyPath };
}

function setup(tool: FakeBuildTool = new FakeBuildTool()) {
  const { root, keyPath } = makeProject();
  const repo: RepoInfo = {
    getTopLevel: async () => root,
    getTagsAtHead: async () => [],
    getShortSha: async () => "abc1234",
  };
  const reporter = createMemoryReporter();
  const orchestrator = new BuildOrchestrator({ repo, createBuildTool: () => tool, reporter, cwd: root, env: {} });
  return { root, keyPath, tool, reporter, orchestrator };
}

function expectOk(res: OrchestratorResult) {
  if (!res.ok) throw new Error(`expected success, failed at ${res.stage}: ${res.error.message}`);
  return res;
}

function expectFailed(res: OrchestratorResult) {
  if (res.ok) throw new Error("expected failure");
  return res;
}

describe("build orchestrator", () => {
  it("dev build without a key produces an unsecured bundle", async () => {
    const { root, orchestrator, reporter } = setup();
    const res = expectOk(await orchestrator.run({ buildType: "dev" }));

    expect(res.status).toBe("done");
    expect(res.result.bundle.path).toBe(path.join(root, "release", "demo_abc1234.tar.gz"));
    expect(res.result.posture).toEqual({ secureBoot: false, encryption: false });
    expect(res.result.bundle.entries.map((e) => e.name)).not.toContain("digest.bin");

    const manifest = readBundleManifest(res.result.bundle.path);
    expect(manifest.writeFlashArgs).not.toContain("--force");
    expect(manifest.security).toEqual({ secure_boot: false, encryption: false, force_offsets: [], read_protected: [] });
    expect(reporter.diagnostics.some((d) => d.level === "warn" && d.code === "ENCRYPTION_OFF")).toBe(true);

    const entries = readBundle(res.result.bundle.path);
    expect(entries.map((e) => e.name)).toEqual([
      "flasher_args.json",
      "flash.sh",
      "bootloader/bootloader.bin",
      "partition_table/partition-table.bin",
      "ota_data_initial.bin",
      "app.bin",
    ]);
    const script = entries.find((e) => e.name === "flash.sh")?.data.toString() ?? "";
    expect(script).not.toContain("WARNING");
  });

  it("dev build ignores the configured signing key", async () => {
    const { orchestrator } = setup();
    const res = expectOk(await orchestrator.run({ buildType: "dev" }));
    expect(res.result.posture.secureBoot).toBe(false);
  });

  it("release build with a key signs, encrypts and ships the digest", async () => {
    const { keyPath, orchestrator } = setup();
    const res = expectOk(await orchestrator.run({ buildType: "release" }));

    expect(res.result.posture).toEqual({ secureBoot: true, encryption: true });
    const entries = readBundle(res.result.bundle.path);
    const digest = entries.find((e) => e.name === "digest.bin");
    expect(digest?.data.equals(deriveDigest(keyPath))).toBe(true);

    const manifest = readBundleManifest(res.result.bundle.path);
    expect(manifest.writeFlashArgs[0]).toBe("--force");
    expect(manifest.writeFlashArgs).toContain("--encrypt");
    expect(manifest.security?.digest_file).toBe("digest.bin");
    expect(manifest.security?.force_offsets).toEqual(["0x1000"]);

    const script = entries.find((e) => e.name === "flash.sh")?.data.toString().split("\n") ?? [];
    const idx = script.findIndex((l) => l.startsWith("esptool.py ") && l.endsWith("0x1000 bootloader/bootloader.bin"));
    expect(script[idx - 1]).toBe(`echo '${FORCE_WARNING}'`);
  });

  it("release build without a key stops before building", async () => {
    const { keyPath, tool, root, orchestrator } = setup();
    fs.rmSync(keyPath);
    const res = expectFailed(await orchestrator.run({ buildType: "release" }));

    expect(res.status).toBe("failed_validate_inputs");
    expect(res.stage).toBe("validate_inputs");
    expect(res.error).toBeInstanceOf(ConfigurationError);
    expect(res.error.message).toBe(`Signing key not found: ${keyPath}`);
    expect(exitCodeFor(res.error)).toBe(2);
    expect(tool.requests).toEqual([]);
    expect(fs.existsSync(path.join(root, "release"))).toBe(false);
    expect(fs.existsSync(path.join(root, "build"))).toBe(false);
  });

  it("rejects an unknown build type", async () => {
    const { orchestrator } = setup();
    const res = expectFailed(await orchestrator.run({ buildType: "prod" }));
    expect(res.status).toBe("failed_resolve_identity");
    expect(res.stages.map((s) => s.status)).toEqual(["success", "failed"]);
  });

  it("fails on a missing config overlay", async () => {
    const { root, orchestrator } = setup();
    fs.rmSync(path.join(root, "sdkconfig.release"));
    const res = expectFailed(await orchestrator.run({ buildType: "release" }));
    expect(res.status).toBe("failed_validate_inputs");
    expect(res.error.message).toBe(`Config overlay not found: ${path.join(root, "sdkconfig.release")}`);
  });

  it("refuses a build directory that contains the project", async () => {
    const { orchestrator } = setup();
    const res = expectFailed(await orchestrator.run({ buildType: "dev", buildDir: "." }));
    expect(res.status).toBe("failed_validate_inputs");
  });

  it("refuses a build directory that holds the signing key", async () => {
    const { root, keyPath, tool, orchestrator } = setup();
    const res = expectFailed(await orchestrator.run({ buildType: "release", buildDir: "keys" }));
    expect(res.status).toBe("failed_validate_inputs");
    expect(res.error).toBeInstanceOf(ConfigurationError);
    expect(res.error.details).toEqual({ field: "build_dir", path: path.join(root, "keys") });
    expect(res.error.message).toBe(
      `Build directory ${path.join(root, "keys")} contains the signing key ${keyPath}; it would be deleted by the clean step`,
    );
    expect(fs.existsSync(keyPath)).toBe(true);
    expect(tool.requests).toEqual([]);
  });

  it("refuses a build directory that holds a config overlay", async () => {
    const { root, orchestrator } = setup();
    const overlay = path.join(root, "conf", "sdkconfig.release");
    fs.mkdirSync(path.dirname(overlay));
    fs.writeFileSync(overlay, "CONFIG_SECURE_BOOT=y\n");
    fs.writeFileSync(path.join(root, "relpack.yaml"), "build_tool:\n  overlays:\n    release: [sdkconfig.defaults, conf/sdkconfig.release]\n");

    const res = expectFailed(await orchestrator.run({ buildType: "release", buildDir: "conf" }));
    expect(res.status).toBe("failed_validate_inputs");
    expect(res.error.details).toEqual({ field: "build_dir", path: path.join(root, "conf") });
    expect(res.error.message).toContain(`contains the config overlay ${overlay}`);
    expect(fs.existsSync(overlay)).toBe(true);
  });

  it("never bundles a copy of the signing key matched by extra files", async () => {
    const { root, keyPath } = makeProject();
    fs.writeFileSync(path.join(root, "relpack.yaml"), "bundle:\n  extra_files: ['*.pem']\n");
    const repo: RepoInfo = { getTopLevel: async () => root, getTagsAtHead: async () => [], getShortSha: async () => "abc1234" };
    const tool: BuildTool = {
      command: "fake-idf",
      preflight: () => {},
      build: async (request) => {
        writeBuildDir(request.buildDir);
        fs.copyFileSync(keyPath, path.join(request.buildDir, "signing.pem"));
      },
    };
    const orchestrator = new BuildOrchestrator({ repo, createBuildTool: () => tool, reporter: createMemoryReporter(), cwd: root, env: {} });

    const res = expectFailed(await orchestrator.run({ buildType: "release", releaseName: "v1" }));
    expect(res.status).toBe("failed_invoke_packager");
    expect(res.error).toBeInstanceOf(ConfigurationError);
    expect(res.error.details).toEqual({ field: "bundle.extra_files", path: path.join(root, "build", "signing.pem") });
    expect(fs.existsSync(path.join(root, "release", "demo_v1.tar.gz"))).toBe(false);
  });

  it("removes stale build output before building", async () => {
    const { root, orchestrator } = setup();
    fs.writeFileSync(path.join(root, "sdkconfig"), "stale\n");
    fs.mkdirSync(path.join(root, "build"), { recursive: true });
    fs.writeFileSync(path.join(root, "build", "stale.bin"), "stale");

    expectOk(await orchestrator.run({ buildType: "dev" }));
    expect(fs.existsSync(path.join(root, "sdkconfig"))).toBe(false);
    expect(fs.existsSync(path.join(root, "build", "stale.bin"))).toBe(false);
  });

  it("passes the build type's overlays to the build tool", async () => {
    const { root, tool, orchestrator } = setup();
    expectOk(await orchestrator.run({ buildType: "release", releaseName: "v1.0.0", buildDir: "out" }));
    expect(tool.requests).toEqual([
      {
        projectRoot: root,
        buildDir: path.join(root, "out"),
        buildType: "release",
        overlays: ["sdkconfig.defaults", "sdkconfig.release"],
      },
    ]);
  });

  it("names the bundle after an explicit release name", async () => {
    const { root, orchestrator } = setup();
    const res = expectOk(await orchestrator.run({ buildType: "dev", releaseName: "nightly build" }));
    expect(res.descriptor).toEqual({ buildType: "dev", releaseName: "nightly_build", buildDir: path.join(root, "build") });
    expect(Object.isFrozen(res.descriptor)).toBe(true);
    expect(path.basename(res.result.bundle.path)).toBe("demo_nightly_build.tar.gz");
  });

  it("dev build with an explicit key gets secure boot", async () => {
    const { keyPath, orchestrator } = setup();
    const res = expectOk(await orchestrator.run({ buildType: "dev", signingKey: keyPath }));
    expect(res.result.posture).toEqual({ secureBoot: true, encryption: false });
    expect(res.result.bundle.entries.map((e) => e.name)).toContain("digest.bin");
  });

  it("dev build warns about an explicit key that does not exist", async () => {
    const { root, orchestrator, reporter } = setup();
    const res = expectOk(await orchestrator.run({ buildType: "dev", signingKey: "keys/absent.pem" }));
    expect(res.result.posture.secureBoot).toBe(false);
    const warning = reporter.diagnostics.find((d) => d.code === "SIGNING_KEY_MISSING");
    expect(warning?.message).toBe(
      `Signing key ${path.join(root, "keys", "absent.pem")} not found; dev build will not use Secure Boot`,
    );
  });

  it("reports a failing build tool", async () => {
    const { orchestrator } = setup(new FakeBuildTool({}, new BuildToolError("fake-idf", 2, "compile error")));
    const res = expectFailed(await orchestrator.run({ buildType: "dev" }));
    expect(res.status).toBe("failed_invoke_build_tool");
    expect(res.error).toBeInstanceOf(BuildToolError);
    expect(res.error.message).toBe("Build tool 'fake-idf' failed with exit code 2");
    expect(exitCodeFor(res.error)).toBe(6);
  });

  it("reports a binary the build did not produce", async () => {
    const { root, orchestrator } = setup(new FakeBuildTool({ skipFiles: ["app.bin"] }));
    const res = expectFailed(await orchestrator.run({ buildType: "dev" }));
    expect(res.status).toBe("failed_invoke_packager");
    expect(res.error).toBeInstanceOf(MissingArtifactError);
    expect(fs.existsSync(path.join(root, "release", "demo_abc1234.tar.gz"))).toBe(false);
  });

  it("records every stage of a successful run", async () => {
    const { orchestrator } = setup();
    const res = expectOk(await orchestrator.run({ buildType: "dev" }));
    expect(res.stages.map((s) => s.stage)).toEqual([
      "resolve_root",
      "resolve_identity",
      "validate_inputs",
      "clean_previous_build",
      "invoke_build_tool",
      "invoke_packager",
    ]);
    expect(res.stages.every((s) => s.status === "success")).toBe(true);
  });
});
