/**
 * FileStatService - wraps metadata lookups for testability.
 *
 * Live implementation uses @effect/platform FileSystem.
 */

import { Context, Data, Effect, Layer, pipe } from "effect"
import { FileSystem } from "@effect/platform"
import type { PlatformError } from "@effect/platform/Error"
import { classifyPlatformError } from "@lib/platformError"

// =============================================================================
// Typed errors
// =============================================================================

export class FileNotFound extends Data.TaggedError("FileNotFound")<{
  readonly path: string
}> {}

export class FilePermissionDenied extends Data.TaggedError("FilePermissionDenied")<{
  readonly path: string
}> {}

export class FileStatUnknownError extends Data.TaggedError("FileStatUnknownError")<{
  readonly path: string
  readonly cause: string
}> {}

export type FileStatError = FileNotFound | FilePermissionDenied | FileStatUnknownError

// =============================================================================
// Service interface
// =============================================================================

export type FileKind = "File" | "Directory" | "Other"

export interface FileStat {
  readonly kind: FileKind
  readonly size: number
}

export interface FileStatService {
  readonly stat: (path: string) => Effect.Effect<FileStat, FileStatError>
}

export class FileStatServiceTag extends Context.Tag("FileStatService")<
  FileStatServiceTag,
  FileStatService
>() {}

const toFileStatError = (path: string, error: PlatformError): FileStatError => {
  switch (classifyPlatformError(error)) {
    case "NotFound":
      return new FileNotFound({ path })
    case "PermissionDenied":
      return new FilePermissionDenied({ path })
    default:
      return new FileStatUnknownError({ path, cause: error.message })
  }
}

const toFileKind = (type: string): FileKind =>
  type === "File" ? "File" : type === "Directory" ? "Directory" : "Other"

// =============================================================================
// Live implementation
// =============================================================================

export const FileStatServiceLive = Layer.effect(
  FileStatServiceTag,
  pipe(
    FileSystem.FileSystem,
    Effect.map((fs) => ({
      stat: (path: string) =>
        pipe(
          fs.stat(path),
          Effect.map((info) => ({ kind: toFileKind(info.type), size: Number(info.size) })),
          Effect.mapError((e) => toFileStatError(path, e))
        ),
    }))
  )
)
