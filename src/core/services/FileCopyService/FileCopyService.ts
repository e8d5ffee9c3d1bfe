/**
 * FileCopyService - byte copy of one file, wrapped for testability.
 *
 * The destination is created exclusively: an existing file is never overwritten.
 * Both handles live in a scope and are closed on every exit path; a partially
 * written destination is removed when the copy fails.
 */

import { Context, Data, Effect, Exit, Layer, Option, pipe } from "effect"
import { FileSystem } from "@effect/platform"
import type { PlatformError } from "@effect/platform/Error"
import { classifyPlatformError } from "@lib/platformError"

// =============================================================================
// Typed errors
// =============================================================================

export class CopySourceNotFound extends Data.TaggedError("CopySourceNotFound")<{
  readonly path: string
}> {}

export class CopyPermissionDenied extends Data.TaggedError("CopyPermissionDenied")<{
  readonly path: string
}> {}

export class CopyDestinationExists extends Data.TaggedError("CopyDestinationExists")<{
  readonly path: string
}> {}

export class CopyDiskFull extends Data.TaggedError("CopyDiskFull")<{
  readonly path: string
}> {}

export class CopyFailed extends Data.TaggedError("CopyFailed")<{
  readonly source: string
  readonly destination: string
  readonly reason: string
}> {}

export type CopyError =
  | CopySourceNotFound
  | CopyPermissionDenied
  | CopyDestinationExists
  | CopyDiskFull
  | CopyFailed

// =============================================================================
// Service interface
// =============================================================================

export interface FileCopyService {
  /** Copies source to destination and resolves to the number of bytes written */
  readonly copy: (source: string, destination: string) => Effect.Effect<number, CopyError>
}

export class FileCopyServiceTag extends Context.Tag("FileCopyService")<
  FileCopyServiceTag,
  FileCopyService
>() {}

const CHUNK_SIZE = 1024 * 1024

const toCopyError =
  (source: string, destination: string, side: "source" | "destination") =>
  (error: PlatformError): CopyError => {
    const path = side === "source" ? source : destination
    switch (classifyPlatformError(error)) {
      case "NotFound":
        return side === "source"
          ? new CopySourceNotFound({ path })
          : new CopyFailed({ source, destination, reason: "destination folder is missing" })
      case "PermissionDenied":
        return new CopyPermissionDenied({ path })
      case "AlreadyExists":
        return new CopyDestinationExists({ path })
      case "NoSpace":
        return new CopyDiskFull({ path: destination })
      default:
        return new CopyFailed({ source, destination, reason: error.message })
    }
  }

// =============================================================================
// Live implementation
// =============================================================================

export const FileCopyServiceLive = Layer.effect(
  FileCopyServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem

    const copy = (source: string, destination: string): Effect.Effect<number, CopyError> =>
      Effect.scoped(
        Effect.gen(function* () {
          const sourceError = toCopyError(source, destination, "source")
          const destinationError = toCopyError(source, destination, "destination")

          const input = yield* pipe(fs.open(source, { flag: "r" }), Effect.mapError(sourceError))
          const output = yield* pipe(
            fs.open(destination, { flag: "wx" }),
            Effect.mapError(destinationError)
          )

          yield* Effect.addFinalizer((exit) =>
            Exit.isFailure(exit)
              ? pipe(
                  fs.remove(destination),
                  Effect.orElse(() =>
                    Effect.logWarning(`Could not remove partial copy at ${destination}`)
                  )
                )
              : Effect.void
          )

          let written = 0
          for (;;) {
            const chunk = yield* pipe(input.readAlloc(CHUNK_SIZE), Effect.mapError(sourceError))
            if (Option.isNone(chunk)) break
            yield* pipe(output.writeAll(chunk.value), Effect.mapError(destinationError))
            written += chunk.value.length
          }

          return written
        })
      )

    return { copy }
  })
)
