import { describe, expect, it } from "vitest";
import { ALL_STAGES, INITIAL_STATUS, nextState } from "../src/core/state-machine.js";

describe("state-machine", () => {
  it("starts at resolve_root", () => {
    expect(INITIAL_STATUS).toBe("resolve_root");
  });

  it("advances through every stage in order", () => {
    expect(nextState("resolve_root", "success")).toBe("resolve_identity");
    expect(nextState("resolve_identity", "success")).toBe("validate_inputs");
    expect(nextState("validate_inputs", "success")).toBe("clean_previous_build");
    expect(nextState("clean_previous_build", "success")).toBe("invoke_build_tool");
    expect(nextState("invoke_build_tool", "success")).toBe("invoke_packager");
    expect(nextState("invoke_packager", "success")).toBe("done");
  });

  it("fails into failed_<stage>", () => {
    for (const stage of ALL_STAGES) {
      expect(nextState(stage, "failure")).toBe(`failed_${stage}`);
    }
  });
});
