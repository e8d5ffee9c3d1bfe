import { Match } from "effect";

import type { InvalidConfig } from "@domain/DistributeConfig";
import type { SourceUnreadable, EmptySource } from "@services/InventoryService";
import type { DestinationNotEmpty, DestinationUnwritable } from "@services/DestinationService";
import type {
  CopySourceNotFound,
  CopyPermissionDenied,
  CopyDestinationExists,
  CopyDiskFull,
  CopyFailed
} from "@services/FileCopyService";

type CopyError =
  | CopySourceNotFound
  | CopyPermissionDenied
  | CopyDestinationExists
  | CopyDiskFull
  | CopyFailed;

type DomainError =
  | InvalidConfig
  | SourceUnreadable
  | EmptySource
  | DestinationNotEmpty
  | DestinationUnwritable
  | CopyError;

export class AppError extends Error {
  readonly _tag = "AppError";

  constructor(
    readonly title: string,
    readonly detail: string,
    readonly suggestion: string
  ) {
    super(`${title}: ${detail}`);
  }

  format(): string {
    return [
      `ERROR: ${this.title}`,
      ``,
      `   ${this.detail}`,
      ``,
      `   Hint: ${this.suggestion}`
    ].join("\n");
  }
}

const OPTION_NAMES: Record<string, string> = {
  maxCount: "--max-files",
  maxBytes: "--max-bytes",
  seed: "--seed",
  extensions: "--extensions",
  concurrency: "--concurrency"
};

const errors = {
  invalidConfig: (field: string, value: string, reason: string) =>
    new AppError(
      "Invalid option",
      `${OPTION_NAMES[field] ?? field} ${reason} (got "${value}").`,
      `Run with --help to see accepted values.`
    ),

  sourceUnreadable: (path: string, reason: string) =>
    new AppError(
      "Cannot read source folder",
      `Could not read "${path}": ${reason}.`,
      `Check that --src points at an existing folder and that you have read permission on it and its files.`
    ),

  emptySource: (path: string, extensions: readonly string[]) =>
    new AppError(
      "No photos found",
      `No files with extension ${extensions.map((e) => `.${e}`).join(", ")} in "${path}".`,
      `Subfolders are not searched. Point --src at the folder that holds the photos, or adjust --extensions.`
    ),

  destinationNotEmpty: (path: string, entryCount: number) =>
    new AppError(
      "Destination folder is not empty",
      `"${path}" already contains ${entryCount} ${entryCount === 1 ? "entry" : "entries"}.`,
      `Refusing to run to avoid mixing old and new output. Choose an empty or new --dst folder.`
    ),

  destinationUnwritable: (path: string, reason: string) =>
    new AppError(
      "Cannot write to destination",
      `Could not create or read "${path}": ${reason}.`,
      `Check that you have write permission on the destination folder.`
    ),

  sourceNotFound: (path: string) =>
    new AppError(
      "Source file missing",
      `The source file "${path}" no longer exists.`,
      `The file may have been moved or deleted during the run. Empty the destination and run again.`
    ),

  copyPermissionDenied: (path: string) =>
    new AppError(
      "Permission denied",
      `Cannot access "${path}" while copying.`,
      `Check read permission on the source photos and write permission on the destination.`
    ),

  destinationFileExists: (path: string) =>
    new AppError(
      "Unexpected file in destination",
      `"${path}" already exists.`,
      `Another process may be writing to the destination. Empty it and run again.`
    ),

  diskFull: (path: string) =>
    new AppError(
      "Disk full",
      `No space left while writing "${path}".`,
      `Free up space on the destination disk, or use a smaller --max-bytes with fewer folders per run.`
    ),

  copyFailed: (source: string, destination: string, reason: string) =>
    new AppError(
      "Copy failed",
      `Could not copy "${source}" to "${destination}": ${reason}`,
      `Check the destination disk and permissions, then empty the destination and run again.`
    ),

  unexpected: (message: string) =>
    new AppError("Unexpected error", message, `If this persists, please report this issue.`),

  permissionDenied: (message: string) =>
    new AppError(
      "Permission denied",
      message,
      `Check that you have the required permissions. You may need to run with elevated privileges.`
    )
};

const matchDomainError = Match.typeTags<DomainError>()({
  InvalidConfig: (e) => errors.invalidConfig(e.field, e.value, e.reason),
  SourceUnreadable: (e) => errors.sourceUnreadable(e.path, e.reason),
  EmptySource: (e) => errors.emptySource(e.path, e.extensions),
  DestinationNotEmpty: (e) => errors.destinationNotEmpty(e.path, e.entryCount),
  DestinationUnwritable: (e) => errors.destinationUnwritable(e.path, e.reason),
  CopySourceNotFound: (e) => errors.sourceNotFound(e.path),
  CopyPermissionDenied: (e) => errors.copyPermissionDenied(e.path),
  CopyDestinationExists: (e) => errors.destinationFileExists(e.path),
  CopyDiskFull: (e) => errors.diskFull(e.path),
  CopyFailed: (e) => errors.copyFailed(e.source, e.destination, e.reason)
});

const DOMAIN_TAGS: ReadonlySet<string> = new Set<DomainError["_tag"]>([
  "InvalidConfig",
  "SourceUnreadable",
  "EmptySource",
  "DestinationNotEmpty",
  "DestinationUnwritable",
  "CopySourceNotFound",
  "CopyPermissionDenied",
  "CopyDestinationExists",
  "CopyDiskFull",
  "CopyFailed"
]);

const isDomainError = (e: unknown): e is DomainError =>
  typeof e === "object" &&
  e !== null &&
  "_tag" in e &&
  typeof e._tag === "string" &&
  DOMAIN_TAGS.has(e._tag);

const isPermissionError = (message: string): boolean =>
  message.toLowerCase().includes("permission denied") ||
  message.toLowerCase().includes("eacces") ||
  message.toLowerCase().includes("operation not permitted") ||
  message.toLowerCase().includes("eperm");

export const fromDomainError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }

  if (isDomainError(error)) {
    return matchDomainError(error);
  }

  if (error instanceof Error) {
    return isPermissionError(error.message)
      ? errors.permissionDenied(error.message)
      : errors.unexpected(error.message);
  }

  return errors.unexpected(String(error));
};

export const {
  invalidConfig,
  sourceUnreadable,
  emptySource,
  destinationNotEmpty,
  destinationUnwritable,
  sourceNotFound,
  copyPermissionDenied,
  destinationFileExists,
  diskFull,
  copyFailed,
  unexpected,
  permissionDenied
} = errors;
