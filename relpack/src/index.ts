export * from "./errors.js";
export type { BuildDescriptor, BuildType } from "./types/descriptor.js";
export type { FlashEntry, FlashManifest, FlashSection, SecurityPosture, SecurityRecord } from "./types/manifest.js";
export type { RelpackConfig } from "./types/config.js";
export { loadConfig, PROJECT_CONFIG_FILE } from "./config/loader.js";
export { parseFlashManifest, readFlashManifest, serializeFlashManifest } from "./manifest/flash-manifest.js";
export { readProjectDescription, bundleFileName } from "./manifest/project-description.js";
export { classifyPosture } from "./security/classifier.js";
export { rewriteManifest } from "./security/rewriter.js";
export { deriveDigest, digestFromKeyMaterial, DIGEST_FILE } from "./security/digest.js";
export { generateFlashScript, FLASH_SCRIPT_FILE } from "./script/flash-script.js";
export { assembleBundle, readBundle, readBundleManifest, type BundleResult } from "./bundle/assembler.js";
export { packageRelease, type PackageOptions, type PackageResult } from "./core/packager.js";
export { BuildOrchestrator, type BuildOptions, type OrchestratorResult } from "./core/orchestrator.js";
export { IdfBuildTool, type BuildTool, type BuildRequest } from "./core/build-tool.js";
export { GitOperations, type RepoInfo } from "./git/operations.js";
export { createReporter, createMemoryReporter, type Reporter, type Diagnostic } from "./output/reporter.js";
export { EXIT, exitCodeFor } from "./commands/exit-codes.js";
