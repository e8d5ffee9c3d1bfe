import { Context, Data, Effect, Layer, Match, pipe } from "effect"
import { DirectoryServiceTag, type DirectoryError } from "../DirectoryService"

export class DestinationNotEmpty extends Data.TaggedError("DestinationNotEmpty")<{
  readonly path: string
  readonly entryCount: number
}> {}

export class DestinationUnwritable extends Data.TaggedError("DestinationUnwritable")<{
  readonly path: string
  readonly reason: string
}> {}

export type DestinationError = DestinationNotEmpty | DestinationUnwritable

export const fromDirectoryError = Match.typeTags<DirectoryError>()({
  DirectoryNotFound: (e) => new DestinationUnwritable({ path: e.path, reason: "parent path does not exist" }),
  DirectoryPermissionDenied: (e) => new DestinationUnwritable({ path: e.path, reason: "permission denied" }),
  NotADirectory: (e) => new DestinationUnwritable({ path: e.path, reason: "a file is in the way" }),
  DirectoryUnknownError: (e) => new DestinationUnwritable({ path: e.path, reason: e.cause }),
})

export interface DestinationService {
  /**
   * Creates the destination root if needed and refuses to continue when it
   * already has content, so old and new output never mix.
   */
  readonly prepare: (path: string) => Effect.Effect<void, DestinationError>
}

export class DestinationServiceTag extends Context.Tag("DestinationService")<
  DestinationServiceTag,
  DestinationService
>() {}

export const DestinationServiceLive = Layer.effect(
  DestinationServiceTag,
  Effect.gen(function* () {
    const directories = yield* DirectoryServiceTag

    const prepare: DestinationService["prepare"] = (path) =>
      pipe(
        directories.create(path),
        Effect.zipRight(directories.list(path)),
        Effect.mapError(fromDirectoryError),
        Effect.flatMap((entries) =>
          entries.length > 0
            ? Effect.fail(new DestinationNotEmpty({ path, entryCount: entries.length }))
            : Effect.void
        )
      )

    return { prepare }
  })
)
