/**
 * Distributor - seeded shuffle followed by greedy sequential packing.
 *
 * Entries are put in canonical id order, permuted with a xorshift64-driven
 * Fisher–Yates shuffle, then walked once left to right. A bin closes when the
 * next entry would push it past the count cap or the byte cap. An entry larger
 * than the byte cap gets a bin of its own without closing the open one.
 */

import { Effect } from "effect"
import type { FileEntry } from "@domain/FileEntry"
import { compareById } from "@domain/FileEntry"
import type { Bin, Distribution } from "@domain/DistributionPlan"
import { createBin, createDistributionPlan } from "@domain/DistributionPlan"
import {
  DEFAULT_MAX_BYTES,
  DEFAULT_MAX_COUNT,
  validateLimits,
  validateSeed,
  type InvalidConfig,
  type PackingLimits,
} from "@domain/DistributeConfig"
import { SeededRandom, generateSeed, shuffleInPlace } from "@lib/SeededRandom"
import { formatSize } from "@lib/parseSize"

export interface DistributeOptions {
  readonly seed?: bigint
  readonly maxCount?: number
  readonly maxBytes?: number
}

export const permuteEntries = (
  entries: readonly FileEntry[],
  rng: SeededRandom
): FileEntry[] => shuffleInPlace([...entries].sort(compareById), rng)

/**
 * Partition an already ordered sequence into bins. Never emits an empty bin.
 */
export const packBins = (ordered: readonly FileEntry[], limits: PackingLimits): Bin[] => {
  const bins: Bin[] = []
  let current: FileEntry[] = []
  let currentBytes = 0

  const closeCurrent = () => {
    if (current.length === 0) return
    bins.push(createBin(bins.length + 1, current))
    current = []
    currentBytes = 0
  }

  for (const entry of ordered) {
    // emitted on its own; the open bin stays open for the entries after it
    if (entry.sizeBytes > limits.maxBytes) {
      bins.push(createBin(bins.length + 1, [entry]))
      continue
    }

    const exceedsCount = current.length + 1 > limits.maxCount
    const exceedsBytes = currentBytes + entry.sizeBytes > limits.maxBytes
    if (exceedsCount || exceedsBytes) {
      closeCurrent()
    }

    current.push(entry)
    currentBytes += entry.sizeBytes
  }

  closeCurrent()
  return bins
}

export const distribute = (
  entries: readonly FileEntry[],
  options: DistributeOptions = {}
): Effect.Effect<Distribution, InvalidConfig> =>
  Effect.gen(function* () {
    const limits = yield* validateLimits({
      maxCount: options.maxCount ?? DEFAULT_MAX_COUNT,
      maxBytes: options.maxBytes ?? DEFAULT_MAX_BYTES,
    })

    const seed =
      options.seed === undefined ? yield* generateSeed : yield* validateSeed(options.seed)

    yield* Effect.logDebug(
      `Distributing ${entries.length} files with seed ${seed} (max ${limits.maxCount} files, ${formatSize(limits.maxBytes)} per folder)`
    )

    const ordered = permuteEntries(entries, new SeededRandom(seed))
    const bins = packBins(ordered, limits)

    yield* Effect.forEach(
      bins,
      (bin) =>
        Effect.logDebug(
          `  Bin ${bin.index}: ${bin.entries.length} files, ${formatSize(bin.totalBytes)}${
            bin.totalBytes > limits.maxBytes ? " (single oversized file)" : ""
          }`
        ),
      { discard: true }
    )

    return {
      plan: createDistributionPlan(bins, limits.maxBytes),
      seed,
    } satisfies Distribution
  })
