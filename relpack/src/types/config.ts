/** Configuration types: package defaults layered with the project's relpack.yaml. */
export type BuildToolConfig = {
  command: string;
  /** SDKCONFIG_DEFAULTS files per build type; an empty list passes no overlay. */
  overlays: {
    dev: string[];
    release: string[];
  };
};

export type FlashConfig = {
  default_port: string;
  baud: number;
};

export type BundleConfig = {
  /** Glob patterns of additional build-directory files to ship. */
  extra_files: string[];
};

export type RelpackConfig = {
  schema_version: string;
  build_dir: string;
  output_dir: string;
  signing_key: string;
  build_tool: BuildToolConfig;
  flash: FlashConfig;
  bundle: BundleConfig;
};
