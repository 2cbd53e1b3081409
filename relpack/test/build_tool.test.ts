import { describe, expect, it } from "vitest";
import { IdfBuildTool, idfBuildArgs } from "../src/core/build-tool.js";
import { BuildToolError, ConfigurationError } from "../src/errors.js";
import { makeTempDir } from "./helpers.js";

describe("idf build tool", () => {
  it("passes overlays as SDKCONFIG_DEFAULTS", () => {
    const args = idfBuildArgs({
      projectRoot: "/p",
      buildDir: "/p/build",
      buildType: "release",
      overlays: ["sdkconfig.defaults", "sdkconfig.release"],
    });
    expect(args).toEqual(["-B", "/p/build", "-D", "SDKCONFIG_DEFAULTS=sdkconfig.defaults;sdkconfig.release", "build"]);
  });

  it("omits SDKCONFIG_DEFAULTS without overlays", () => {
    expect(idfBuildArgs({ projectRoot: "/p", buildDir: "/p/build", buildType: "dev", overlays: [] })).toEqual([
      "-B",
      "/p/build",
      "build",
    ]);
  });

  it("requires a sourced ESP-IDF environment", () => {
    expect(() => new IdfBuildTool("idf.py", {}).preflight()).toThrow(ConfigurationError);
    expect(() => new IdfBuildTool("idf.py", { IDF_PATH: "/opt/esp-idf" }).preflight()).not.toThrow();
  });

  it("wraps a command that cannot be started", async () => {
    const dir = makeTempDir("tool");
    const tool = new IdfBuildTool("relpack-no-such-tool", {});
    const err = await tool.build({ projectRoot: dir, buildDir: dir, buildType: "dev", overlays: [] }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(BuildToolError);
    if (err instanceof BuildToolError) {
      expect(err.exitCode).toBeNull();
      expect(err.message).toBe("Build tool 'relpack-no-such-tool' failed");
    }
  });
});
