/** Build identity resolved by the orchestrator and shared by every packaging stage. */
export const BUILD_TYPES = ["dev", "release"] as const;

export type BuildType = (typeof BUILD_TYPES)[number];

export type BuildDescriptor = Readonly<{
  buildType: BuildType;
  releaseName: string;
  buildDir: string;
}>;

export function isBuildType(value: unknown): value is BuildType {
  return typeof value === "string" && BUILD_TYPES.some((t) => t === value);
}
