import { join } from "node:path"
import { Context, Data, Effect, Layer, Match, pipe } from "effect"
import { DirectoryServiceTag, type DirectoryError } from "../DirectoryService"
import { FileStatServiceTag, type FileStatError } from "../FileStatService"
import type { FileEntry } from "@domain/FileEntry"
import { compareById } from "@domain/FileEntry"
import { filterByExtension } from "@domain/ExtensionFilter"

export class SourceUnreadable extends Data.TaggedError("SourceUnreadable")<{
  readonly path: string
  readonly reason: string
}> {}

export class EmptySource extends Data.TaggedError("EmptySource")<{
  readonly path: string
  readonly extensions: readonly string[]
}> {}

export type InventoryError = SourceUnreadable | EmptySource

const fromDirectoryError = Match.typeTags<DirectoryError>()({
  DirectoryNotFound: (e) => new SourceUnreadable({ path: e.path, reason: "path does not exist" }),
  DirectoryPermissionDenied: (e) => new SourceUnreadable({ path: e.path, reason: "permission denied" }),
  NotADirectory: (e) => new SourceUnreadable({ path: e.path, reason: "not a directory" }),
  DirectoryUnknownError: (e) => new SourceUnreadable({ path: e.path, reason: e.cause }),
})

const fromSourceStatError = Match.typeTags<FileStatError>()({
  FileNotFound: (e) => new SourceUnreadable({ path: e.path, reason: "path does not exist" }),
  FilePermissionDenied: (e) => new SourceUnreadable({ path: e.path, reason: "permission denied" }),
  FileStatUnknownError: (e) => new SourceUnreadable({ path: e.path, reason: e.cause }),
})

const fromFileStatError = Match.typeTags<FileStatError>()({
  FileNotFound: (e) => new SourceUnreadable({ path: e.path, reason: "file disappeared during scan" }),
  FilePermissionDenied: (e) => new SourceUnreadable({ path: e.path, reason: "permission denied" }),
  FileStatUnknownError: (e) => new SourceUnreadable({ path: e.path, reason: e.cause }),
})

export interface InventoryOptions {
  readonly extensions: ReadonlySet<string>
  readonly concurrency?: number
}

export interface InventoryService {
  /**
   * Regular files directly inside `sourcePath` whose extension is accepted,
   * sorted by id.
   */
  readonly build: (
    sourcePath: string,
    options: InventoryOptions
  ) => Effect.Effect<FileEntry[], InventoryError>
}

export class InventoryServiceTag extends Context.Tag("InventoryService")<
  InventoryServiceTag,
  InventoryService
>() {}

export const InventoryServiceLive = Layer.effect(
  InventoryServiceTag,
  Effect.gen(function* () {
    const directories = yield* DirectoryServiceTag
    const fileStat = yield* FileStatServiceTag

    const ensureDirectory = (sourcePath: string): Effect.Effect<void, SourceUnreadable> =>
      pipe(
        fileStat.stat(sourcePath),
        Effect.mapError(fromSourceStatError),
        Effect.flatMap((stat) =>
          stat.kind === "Directory"
            ? Effect.void
            : Effect.fail(new SourceUnreadable({ path: sourcePath, reason: "not a directory" }))
        )
      )

    // Directories named like images are skipped, not treated as errors
    const toEntry = (
      sourcePath: string,
      name: string
    ): Effect.Effect<FileEntry | undefined, SourceUnreadable> => {
      const id = join(sourcePath, name)
      return pipe(
        fileStat.stat(id),
        Effect.mapError(fromFileStatError),
        Effect.map((stat) => (stat.kind === "File" ? { id, name, sizeBytes: stat.size } : undefined))
      )
    }

    const build: InventoryService["build"] = (sourcePath, options) =>
      Effect.gen(function* () {
        yield* ensureDirectory(sourcePath)

        const names = yield* pipe(directories.list(sourcePath), Effect.mapError(fromDirectoryError))
        const candidates = filterByExtension(names, options.extensions)

        yield* Effect.logDebug(
          `Listed ${names.length} entries in ${sourcePath}, ${candidates.length} with accepted extensions`
        )

        const entries = yield* Effect.forEach(candidates, (name) => toEntry(sourcePath, name), {
          concurrency: options.concurrency ?? 16,
        })

        const files = entries
          .filter((entry): entry is FileEntry => entry !== undefined)
          .sort(compareById)

        if (files.length === 0) {
          return yield* Effect.fail(
            new EmptySource({ path: sourcePath, extensions: [...options.extensions] })
          )
        }

        return files
      })

    return { build }
  })
)
