import { Effect, pipe } from "effect"
import { Console } from "effect"

import type { PlanOptions, CopyOptions } from "./options"
import { parseDistributeOptions, parseConcurrency } from "./optionParsing"
import { fromDomainError } from "./errors"

import {
  createDistribution,
  prepareDestination,
  materializeDistribution,
  AppLive,
  type DistributionResult,
} from "@core"
import { LoggerServiceTag } from "@services/LoggerService"

/**
 * Error handling wrapper for CLI commands: prints the formatted error and
 * marks the process as failed.
 */
export const withErrorHandling = <A, R>(
  effect: Effect.Effect<A, unknown, R>
): Effect.Effect<void, never, R> =>
  pipe(
    effect,
    Effect.catchAll((error) =>
      pipe(
        Console.error(`\n${fromDomainError(error).format()}\n`),
        Effect.zipRight(
          Effect.sync(() => {
            process.exitCode = 1
          })
        )
      )
    ),
    Effect.asVoid
  )

const reportDistribution = (result: DistributionResult, seedGiven: boolean, maxBytes: number) =>
  Effect.gen(function* () {
    const logger = yield* LoggerServiceTag

    yield* logger.plan.inventoryFound(result.inventory.fileCount, result.inventory.totalBytes)
    yield* logger.plan.seed(result.seed, !seedGiven)
    yield* logger.plan.binsHeader
    yield* Effect.forEach(result.plan.bins, (bin) => logger.plan.binInfo(bin, maxBytes), {
      discard: true,
    })
    yield* logger.plan.planStats(result.plan.summary)
  })

/**
 * Run the plan command: shows what copy would do for the same options and seed.
 */
export const runPlan = (options: PlanOptions) =>
  Effect.gen(function* () {
    const logger = yield* LoggerServiceTag

    if (options.debug) {
      yield* Effect.logInfo("Debug logging enabled")
    }

    const config = yield* parseDistributeOptions(options)

    yield* logger.plan.header
    yield* logger.plan.scanningSource(options.src)

    const result = yield* createDistribution(options.src, config)
    yield* reportDistribution(result, config.seed !== undefined, config.maxBytes)

    return result
  })

/**
 * Run the copy command
 */
export const runCopy = (options: CopyOptions) =>
  Effect.gen(function* () {
    const logger = yield* LoggerServiceTag

    if (options.debug) {
      yield* Effect.logInfo("Debug logging enabled")
    }

    const config = yield* parseDistributeOptions(options)
    const concurrency = yield* parseConcurrency(options.concurrency)

    yield* logger.copy.header
    yield* logger.copy.preparingDestination(options.dst)
    yield* prepareDestination(options.dst)

    yield* logger.plan.scanningSource(options.src)
    const result = yield* createDistribution(options.src, config)
    yield* reportDistribution(result, config.seed !== undefined, config.maxBytes)

    yield* logger.copy.copying(result.plan.summary.binCount, result.plan.summary.totalFiles, concurrency)
    const report = yield* materializeDistribution(result, options.dst, {
      concurrency,
      onBinComplete: logger.copy.binCopied,
    })

    yield* logger.copy.complete(report, options.dst)
    return report
  })

/**
 * Export the application layer for CLI
 */
export { AppLive }
