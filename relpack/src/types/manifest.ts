/** Typed view of the build tool's flasher_args.json. */

export type FlashEntry = {
  offset: string;
  file: string;
};

/** A named top-level block such as `bootloader`, `app`, `partition-table` or `otadata`. */
export interface FlashSection {
  offset: string;
  file: string;
  encrypted?: "true" | "false";
  [key: string]: unknown;
}

export interface FlashSettings {
  flash_mode?: string;
  flash_freq?: string;
  flash_size?: string;
  [key: string]: unknown;
}

export interface ExtraEsptoolArgs {
  before?: string;
  after?: string;
  chip?: string;
  stub?: boolean;
  [key: string]: unknown;
}

/** Written by the rewriter; absent in raw build-tool output. */
export type SecurityRecord = {
  secure_boot: boolean;
  encryption: boolean;
  force_offsets: string[];
  read_protected: string[];
  digest_file?: string;
};

export type FlashManifest = {
  writeFlashArgs: string[];
  flashSettings: FlashSettings;
  /** Insertion order is flashing order. */
  flashFiles: FlashEntry[];
  sections: Record<string, FlashSection>;
  extraEsptoolArgs: ExtraEsptoolArgs;
  security?: SecurityRecord;
  /** Top-level keys this model does not know, kept verbatim. */
  extensions: Record<string, unknown>;
  /** Top-level key order of the source document. */
  keyOrder: string[];
};

export type SecurityPosture = {
  secureBoot: boolean;
  encryption: boolean;
};
