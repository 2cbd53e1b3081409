#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { build, type BundleCommandResult } from "./commands/build.js";
import { digest } from "./commands/digest.js";
import { EXIT } from "./commands/exit-codes.js";
import { failureDiagnostic, type CommandFailure } from "./commands/failure.js";
import { inspect } from "./commands/inspect.js";
import { packageBuild } from "./commands/package.js";
import { createReporter, type OutputFormat, type Reporter } from "./output/reporter.js";

function parseFormat(value: string): OutputFormat {
  if (value === "human" || value === "jsonl") return value;
  throw new InvalidArgumentError("Output format must be human or jsonl.");
}

function fail(reporter: Reporter, failure: CommandFailure): never {
  reporter.report(failureDiagnostic(failure));
  process.exit(failure.exitCode);
}

function finishBundle(reporter: Reporter, format: OutputFormat, res: BundleCommandResult): void {
  if (!res.ok) fail(reporter, res);
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "info", code: "OK", path: res.bundlePath, sha256: res.sha256 }) + "\n");
  } else {
    console.log(`Release bundle: ${res.bundlePath}`);
    console.log(`sha256: ${res.sha256}`);
  }
}

const program = new Command();

program
  .name("relpack")
  .description("Build and package ESP32 firmware releases")
  .version("0.1.0");

program
  .command("build")
  .description("Build the firmware and package it into a release bundle")
  .option("-t, --type <type>", "Build type: dev|release")
  .option("-n, --name <name>", "Release name (default: tag at HEAD, else short commit id)")
  .option("--build-dir <path>", "Build directory")
  .option("--signing-key <path>", "Secure Boot signing key (PEM)")
  .option("--output-dir <path>", "Where the bundle is written")
  .option("--config <path>", "Project config file (default: relpack.yaml at the project root)")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(
    async (opts: {
      type?: string;
      name?: string;
      buildDir?: string;
      signingKey?: string;
      outputDir?: string;
      config?: string;
      format: OutputFormat;
    }) => {
      const reporter = createReporter(opts.format);
      const res = await build({
        buildType: opts.type,
        releaseName: opts.name,
        buildDir: opts.buildDir,
        signingKey: opts.signingKey,
        outputDir: opts.outputDir,
        configFile: opts.config,
        cwd: process.cwd(),
        env: process.env,
        reporter,
      });
      finishBundle(reporter, opts.format, res);
    },
  );

program
  .command("package")
  .description("Package an existing build directory")
  .option("--build-dir <path>", "Build directory (default: configured build_dir)")
  .option("-t, --type <type>", "Build type: dev|release", "release")
  .option("-n, --name <name>", "Release name (default: project version)")
  .option("--signing-key <path>", "Secure Boot signing key (PEM)")
  .option("--output-dir <path>", "Where the bundle is written")
  .option("--config <path>", "Project config file")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(
    async (opts: {
      buildDir?: string;
      type: string;
      name?: string;
      signingKey?: string;
      outputDir?: string;
      config?: string;
      format: OutputFormat;
    }) => {
      const reporter = createReporter(opts.format);
      const res = await packageBuild({
        buildDir: opts.buildDir,
        buildType: opts.type,
        name: opts.name,
        signingKey: opts.signingKey,
        outputDir: opts.outputDir,
        configFile: opts.config,
        cwd: process.cwd(),
        env: process.env,
        reporter,
      });
      finishBundle(reporter, opts.format, res);
    },
  );

program
  .command("digest")
  .description("Print or write the Secure Boot public key digest of a signing key")
  .requiredOption("-k, --key <path>", "Signing key (PEM or DER)")
  .option("-o, --out <path>", "Write the raw 32-byte digest here")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action((opts: { key: string; out?: string; format: OutputFormat }) => {
    const reporter = createReporter(opts.format);
    const res = digest({ keyPath: opts.key, outPath: opts.out, cwd: process.cwd() });
    if (!res.ok) fail(reporter, res);
    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "DIGEST", sha256: res.hex, path: res.outPath ?? null }) + "\n");
    } else {
      console.log(res.outPath ? `${res.hex}  ${res.outPath}` : res.hex);
    }
  });

program
  .command("inspect")
  .description("List the contents of a release bundle")
  .argument("<bundle>", "Path to a .tar.gz release bundle")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action((bundle: string, opts: { format: OutputFormat }) => {
    const reporter = createReporter(opts.format);
    const res = inspect({ bundlePath: bundle, cwd: process.cwd() });
    if (!res.ok) fail(reporter, res);
    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "BUNDLE", path: res.path, sha256: res.sha256 }) + "\n");
      for (const e of res.entries) process.stdout.write(JSON.stringify(e) + "\n");
    } else {
      console.log(`${res.sha256}  ${res.path}`);
      for (const e of res.entries) console.log(`${e.mode}  ${String(e.size).padStart(10)}  ${e.sha256}  ${e.name}`);
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.UNEXPECTED);
});
