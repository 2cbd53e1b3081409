import path from "node:path";
import { assembleBundle, collectExtraFiles, type BundleResult } from "../bundle/assembler.js";
import { ConfigurationError } from "../errors.js";
import { readFlashManifest } from "../manifest/flash-manifest.js";
import { bundleFileName, readProjectDescription } from "../manifest/project-description.js";
import { createMemoryReporter, type Reporter } from "../output/reporter.js";
import { generateFlashScript } from "../script/flash-script.js";
import { classifyPosture } from "../security/classifier.js";
import { DIGEST_FILE, deriveDigest } from "../security/digest.js";
import { rewriteManifest } from "../security/rewriter.js";
import type { FlashConfig } from "../types/config.js";
import type { BuildDescriptor } from "../types/descriptor.js";
import type { SecurityPosture } from "../types/manifest.js";

export type PackageOptions = {
  outputDir: string;
  /** Key to classify with; see classifyPosture for when callers pass one. */
  signingKeyPath?: string;
  flash: FlashConfig;
  extraFilePatterns?: string[];
  reporter?: Reporter;
};

export type PackageResult = {
  projectName: string;
  posture: SecurityPosture;
  bundle: BundleResult;
};

/**
 * Classify → rewrite → digest → script → bundle, over one build directory.
 */
export function packageRelease(descriptor: BuildDescriptor, opts: PackageOptions): PackageResult {
  const reporter = opts.reporter ?? createMemoryReporter();
  const { buildDir, buildType, releaseName } = descriptor;

  const manifest = readFlashManifest(buildDir);
  const project = readProjectDescription(buildDir);

  const posture = classifyPosture(manifest, { buildType, signingKeyPath: opts.signingKeyPath });
  reporter.info("POSTURE", `Secure Boot ${posture.secureBoot ? "enabled" : "disabled"}, flash encryption ${posture.encryption ? "enabled" : "disabled"}`, {
    secure_boot: posture.secureBoot,
    encryption: posture.encryption,
  });
  if (!posture.encryption) reporter.warn("ENCRYPTION_OFF", "App is not encrypted; encryption will not be enforced");

  rewriteManifest(manifest, posture);

  let digest: Buffer | undefined;
  if (posture.secureBoot) {
    if (!opts.signingKeyPath) {
      throw new ConfigurationError("digest", "Secure Boot is enabled but no signing key path was given", { field: "signing_key" });
    }
    digest = deriveDigest(opts.signingKeyPath);
    if (manifest.security) manifest.security.digest_file = DIGEST_FILE;
    reporter.info("DIGEST", "Secure Boot V2 public key digest generated");
  }

  const script = generateFlashScript(manifest, posture, {
    projectName: project.projectName,
    releaseName,
    defaultPort: opts.flash.default_port,
    baud: opts.flash.baud,
  });

  const outputPath = path.join(opts.outputDir, bundleFileName(project.projectName, releaseName));
  const bundle = assembleBundle({
    buildDir,
    outputPath,
    manifest,
    script,
    digest,
    extraFiles: collectExtraFiles(buildDir, opts.extraFilePatterns ?? []),
    signingKeyPath: opts.signingKeyPath,
  });
  reporter.info("BUNDLE", `Release bundle created: ${bundle.path}`, { sha256: bundle.sha256, entries: bundle.entries.length });

  return { projectName: project.projectName, posture, bundle };
}
