/**
 * MaterializerService - turns a finalized plan into folders on disk.
 *
 * Each bin becomes `<root>/<index>`; its entries are copied in plan order.
 * Bins are independent once the plan is final, so they run in parallel.
 */

import { join } from "node:path"
import { Context, Effect, Layer, pipe } from "effect"
import type { Bin, DistributionPlan } from "@domain/DistributionPlan"
import { DirectoryServiceTag } from "../DirectoryService"
import { FileCopyServiceTag, type CopyError } from "../FileCopyService"
import { fromDirectoryError, type DestinationUnwritable } from "../DestinationService"

export type MaterializeError = CopyError | DestinationUnwritable

export interface MaterializeOptions {
  readonly concurrency?: number
  readonly onBinComplete?: (bin: Bin, directory: string) => Effect.Effect<void>
}

export interface MaterializeReport {
  readonly binsCreated: number
  readonly filesCopied: number
  readonly bytesCopied: number
}

export interface MaterializerService {
  readonly materialize: (
    plan: DistributionPlan,
    destinationRoot: string,
    options?: MaterializeOptions
  ) => Effect.Effect<MaterializeReport, MaterializeError>
}

export class MaterializerServiceTag extends Context.Tag("MaterializerService")<
  MaterializerServiceTag,
  MaterializerService
>() {}

export const binDirectory = (destinationRoot: string, bin: Bin): string =>
  join(destinationRoot, String(bin.index))

export const MaterializerServiceLive = Layer.effect(
  MaterializerServiceTag,
  Effect.gen(function* () {
    const directories = yield* DirectoryServiceTag
    const copier = yield* FileCopyServiceTag

    const materializeBin = (
      bin: Bin,
      destinationRoot: string,
      options: MaterializeOptions
    ): Effect.Effect<number, MaterializeError> =>
      Effect.gen(function* () {
        const directory = binDirectory(destinationRoot, bin)
        yield* pipe(directories.create(directory), Effect.mapError(fromDirectoryError))

        const written = yield* Effect.forEach(bin.entries, (entry) =>
          copier.copy(entry.id, join(directory, entry.name))
        )

        yield* Effect.logDebug(`Folder ${directory}: ${bin.entries.length} files copied`)
        if (options.onBinComplete) {
          yield* options.onBinComplete(bin, directory)
        }

        return written.reduce((acc, bytes) => acc + bytes, 0)
      })

    const materialize: MaterializerService["materialize"] = (plan, destinationRoot, options = {}) =>
      pipe(
        Effect.forEach(plan.bins, (bin) => materializeBin(bin, destinationRoot, options), {
          concurrency: options.concurrency ?? 4,
        }),
        Effect.map((bytesPerBin) => ({
          binsCreated: plan.bins.length,
          filesCopied: plan.summary.totalFiles,
          bytesCopied: bytesPerBin.reduce((acc, bytes) => acc + bytes, 0),
        }))
      )

    return { materialize }
  })
)
