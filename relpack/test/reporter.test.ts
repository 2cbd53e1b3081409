import { describe, expect, it } from "vitest";
import { Writable } from "node:stream";
import { createMemoryReporter, createReporter } from "../src/output/reporter.js";

function sink(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}

describe("reporter", () => {
  it("writes info to stdout and warnings to stderr in human format", () => {
    const out = sink();
    const err = sink();
    const reporter = createReporter("human", { stdout: out.stream, stderr: err.stream });
    reporter.info("BUILD", "Building");
    reporter.warn("ENCRYPTION_OFF", "App is not encrypted");
    reporter.report({ level: "error", code: "X", message: "failed at config: bad" });
    expect(out.text()).toBe("Building\n");
    expect(err.text()).toBe("warning: App is not encrypted\nerror: failed at config: bad\n");
  });

  it("writes one JSON object per line in jsonl format", () => {
    const out = sink();
    const err = sink();
    const reporter = createReporter("jsonl", { stdout: out.stream, stderr: err.stream });
    reporter.info("DIGEST", "done", { bytes: 32 });
    reporter.warn("W", "careful");
    expect(out.text().trim().split("\n").map((l) => JSON.parse(l))).toEqual([
      { level: "info", code: "DIGEST", message: "done", details: { bytes: 32 } },
      { level: "warn", code: "W", message: "careful" },
    ]);
    expect(err.text()).toBe("");
  });

  it("collects diagnostics in memory", () => {
    const reporter = createMemoryReporter();
    reporter.info("A", "one");
    expect(reporter.diagnostics).toEqual([{ level: "info", code: "A", message: "one" }]);
  });
});
