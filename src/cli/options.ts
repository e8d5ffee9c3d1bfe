import { Options } from "@effect/cli";
import { DEFAULT_EXTENSIONS, DEFAULT_MAX_BYTES, DEFAULT_MAX_COUNT } from "@domain/DistributeConfig";

/** Flag values that stand for the distribution defaults */
export const optionDefaults = {
  maxFiles: DEFAULT_MAX_COUNT,
  maxBytes: String(DEFAULT_MAX_BYTES),
  extensions: DEFAULT_EXTENSIONS.join(",")
} as const;

export const src = Options.text("src").pipe(
  Options.withDescription("Source folder holding the photos (not searched recursively)")
);

export const dst = Options.text("dst").pipe(
  Options.withDescription("Destination folder; numbered subfolders 1..N are created inside it. Must be empty.")
);

export const maxFiles = Options.integer("max-files").pipe(
  Options.withDescription("Max photos per folder"),
  Options.withDefault(optionDefaults.maxFiles)
);

export const maxBytes = Options.text("max-bytes").pipe(
  Options.withDescription("Max total size per folder (e.g., 4GiB, 500MiB, or raw bytes)"),
  Options.withDefault(optionDefaults.maxBytes)
);

export const seed = Options.text("seed").pipe(
  Options.withDescription("Shuffle seed (unsigned 64-bit integer). Random if not set; the seed used is printed."),
  Options.optional
);

export const extensions = Options.text("extensions").pipe(
  Options.withDescription("Accepted file extensions, comma-separated, case-insensitive"),
  Options.withDefault(optionDefaults.extensions)
);

export const concurrency = Options.integer("concurrency").pipe(
  Options.withDescription("Folders copied in parallel (default: 4)"),
  Options.withDefault(4)
);

export const debug = Options.boolean("debug").pipe(
  Options.withDescription("Enable verbose debug logging"),
  Options.withDefault(false)
);

export interface PlanOptions {
  readonly src: string;
  readonly maxFiles: number;
  readonly maxBytes: string;
  readonly seed: string | undefined;
  readonly extensions: string;
  readonly debug?: boolean;
}

export interface CopyOptions extends PlanOptions {
  readonly dst: string;
  readonly concurrency: number;
}
