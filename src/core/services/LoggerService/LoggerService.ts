/**
 * LoggerService - formatted console output for the plan and copy commands
 */

import { Context, Effect, Layer, Console } from "effect"
import type { Bin, PlanSummary } from "@domain/DistributionPlan"
import type { MaterializeReport } from "../MaterializerService"
import { formatSize } from "@lib/parseSize"

// =============================================================================
// Service interface
// =============================================================================

export interface LoggerService {
  readonly plan: {
    readonly header: Effect.Effect<void>
    readonly scanningSource: (path: string) => Effect.Effect<void>
    readonly inventoryFound: (count: number, totalBytes: number) => Effect.Effect<void>
    readonly seed: (seed: bigint, generated: boolean) => Effect.Effect<void>
    readonly binsHeader: Effect.Effect<void>
    readonly binInfo: (bin: Bin, maxBytes: number) => Effect.Effect<void>
    readonly planStats: (summary: PlanSummary) => Effect.Effect<void>
  }
  readonly copy: {
    readonly header: Effect.Effect<void>
    readonly preparingDestination: (path: string) => Effect.Effect<void>
    readonly copying: (bins: number, files: number, concurrency: number) => Effect.Effect<void>
    readonly binCopied: (bin: Bin, directory: string) => Effect.Effect<void>
    readonly complete: (report: MaterializeReport, destinationRoot: string) => Effect.Effect<void>
  }
}

export class LoggerServiceTag extends Context.Tag("LoggerService")<
  LoggerServiceTag,
  LoggerService
>() {}

// =============================================================================
// Implementation
// =============================================================================

export const LoggerServiceLive = Layer.succeed(LoggerServiceTag, {
  plan: {
    header: Console.log("\n🖼️  Image Rando - Plan\n"),
    scanningSource: (path) => Console.log(`🔍 Scanning ${path}...`),
    inventoryFound: (count, totalBytes) =>
      Console.log(`   Found ${count} photos (${formatSize(totalBytes)})`),
    seed: (seed, generated) =>
      Console.log(`🎲 Seed: ${seed}${generated ? " (generated, pass --seed to reproduce)" : ""}`),
    binsHeader: Console.log("\n📁 Folders:"),
    binInfo: (bin, maxBytes) =>
      Console.log(
        `   ${String(bin.index).padStart(4)}: ${String(bin.entries.length).padStart(5)} files, ${formatSize(bin.totalBytes)}${
          bin.totalBytes > maxBytes ? "  ⚠️  single file over the size cap" : ""
        }`
      ),
    planStats: (summary) =>
      Effect.gen(function* () {
        yield* Console.log(`\n📊 Plan Summary:`)
        yield* Console.log(`   Folders: ${summary.binCount}`)
        yield* Console.log(`   Photos: ${summary.totalFiles}`)
        yield* Console.log(`   Total data: ${formatSize(summary.totalBytes)}`)
        if (summary.oversizedBins > 0) {
          yield* Console.log(`   Oversized files in their own folder: ${summary.oversizedBins}`)
        }
      }),
  },
  copy: {
    header: Console.log("\n🖼️  Image Rando - Copy\n"),
    preparingDestination: (path) => Console.log(`📂 Preparing ${path}...`),
    copying: (bins, files, concurrency) =>
      Console.log(`\n📤 Copying ${files} photos into ${bins} folders (concurrency: ${concurrency})...\n`),
    binCopied: (bin, directory) =>
      Console.log(`   ✓ ${directory}: ${bin.entries.length} files, ${formatSize(bin.totalBytes)}`),
    complete: (report, destinationRoot) =>
      Effect.gen(function* () {
        yield* Console.log(
          `\n✅ Copied ${report.filesCopied} photos into ${report.binsCreated} folders under ${destinationRoot}`
        )
        yield* Console.log(`   Total bytes copied: ${report.bytesCopied}\n`)
      }),
  },
})
