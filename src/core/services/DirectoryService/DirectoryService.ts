/**
 * DirectoryService - directory listing and creation, wrapped for testability.
 *
 * Listing is non-recursive: names directly inside the directory, no paths.
 */

import { Context, Data, Effect, Layer, pipe } from "effect"
import { FileSystem } from "@effect/platform"
import type { PlatformError } from "@effect/platform/Error"
import { classifyPlatformError } from "@lib/platformError"

// =============================================================================
// Typed errors
// =============================================================================

export class DirectoryNotFound extends Data.TaggedError("DirectoryNotFound")<{
  readonly path: string
}> {}

export class DirectoryPermissionDenied extends Data.TaggedError("DirectoryPermissionDenied")<{
  readonly path: string
}> {}

export class NotADirectory extends Data.TaggedError("NotADirectory")<{
  readonly path: string
}> {}

export class DirectoryUnknownError extends Data.TaggedError("DirectoryUnknownError")<{
  readonly path: string
  readonly cause: string
}> {}

export type DirectoryError =
  | DirectoryNotFound
  | DirectoryPermissionDenied
  | NotADirectory
  | DirectoryUnknownError

// =============================================================================
// Service interface
// =============================================================================

export interface DirectoryService {
  readonly list: (path: string) => Effect.Effect<string[], DirectoryError>
  /** Creates the directory and any missing parents; existing directories are fine */
  readonly create: (path: string) => Effect.Effect<void, DirectoryError>
}

export class DirectoryServiceTag extends Context.Tag("DirectoryService")<
  DirectoryServiceTag,
  DirectoryService
>() {}

const toDirectoryError = (path: string, error: PlatformError): DirectoryError => {
  switch (classifyPlatformError(error)) {
    case "NotFound":
      return new DirectoryNotFound({ path })
    case "PermissionDenied":
      return new DirectoryPermissionDenied({ path })
    case "NotADirectory":
    // recursive mkdir only reports EEXIST when a non-directory holds the path
    case "AlreadyExists":
      return new NotADirectory({ path })
    default:
      return new DirectoryUnknownError({ path, cause: error.message })
  }
}

// =============================================================================
// Live implementation
// =============================================================================

export const DirectoryServiceLive = Layer.effect(
  DirectoryServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem

    return {
      list: (path: string) =>
        pipe(
          fs.readDirectory(path),
          Effect.map((names) => [...names]),
          Effect.mapError((e) => toDirectoryError(path, e))
        ),

      create: (path: string) =>
        pipe(
          fs.makeDirectory(path, { recursive: true }),
          Effect.mapError((e) => toDirectoryError(path, e))
        ),
    }
  })
)
