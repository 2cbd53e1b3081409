import type { Writable } from "node:stream";

export type OutputFormat = "human" | "jsonl";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  stage?: string;
  details?: Record<string, unknown>;
};

export type Reporter = {
  report(diagnostic: Diagnostic): void;
  info(code: string, message: string, details?: Record<string, unknown>): void;
  warn(code: string, message: string, details?: Record<string, unknown>): void;
};

function withHelpers(report: (d: Diagnostic) => void): Reporter {
  return {
    report,
    info: (code, message, details) => report({ level: "info", code, message, ...(details ? { details } : {}) }),
    warn: (code, message, details) => report({ level: "warn", code, message, ...(details ? { details } : {}) }),
  };
}

/**
 * Human format writes messages (errors and warnings to stderr); jsonl writes one
 * Diagnostic per line to stdout.
 */
export function createReporter(
  format: OutputFormat,
  streams: { stdout: Writable; stderr: Writable } = { stdout: process.stdout, stderr: process.stderr },
): Reporter {
  return withHelpers((d) => {
    if (format === "jsonl") {
      streams.stdout.write(JSON.stringify(d) + "\n");
      return;
    }
    if (d.level === "info") {
      streams.stdout.write(d.message + "\n");
    } else {
      const prefix = d.level === "error" ? "error" : "warning";
      streams.stderr.write(`${prefix}: ${d.message}\n`);
    }
  });
}

/** Collects diagnostics in memory. */
export function createMemoryReporter(): Reporter & { diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  return { ...withHelpers((d) => diagnostics.push(d)), diagnostics };
}
