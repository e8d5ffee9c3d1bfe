import type { FileEntry } from "./FileEntry";
import { totalSize } from "./FileEntry";

/**
 * One numbered destination folder and the files planned for it, in copy order.
 */
export interface Bin {
  readonly index: number;
  readonly entries: readonly FileEntry[];
  readonly totalBytes: number;
}

export interface PlanSummary {
  readonly binCount: number;
  readonly totalFiles: number;
  readonly totalBytes: number;
  /** Bins holding a single file larger than the byte cap */
  readonly oversizedBins: number;
}

export interface DistributionPlan {
  readonly bins: readonly Bin[];
  readonly summary: PlanSummary;
}

export interface Distribution {
  readonly plan: DistributionPlan;
  /** Seed the permutation was drawn from, given or generated */
  readonly seed: bigint;
}

export const createBin = (index: number, entries: readonly FileEntry[]): Bin => ({
  index,
  entries,
  totalBytes: totalSize(entries),
});

export const isOversizedBin = (bin: Bin, maxBytes: number): boolean =>
  bin.entries.length === 1 && bin.totalBytes > maxBytes;

export const computeSummary = (bins: readonly Bin[], maxBytes: number): PlanSummary =>
  bins.reduce<PlanSummary>(
    (acc, bin) => ({
      binCount: acc.binCount + 1,
      totalFiles: acc.totalFiles + bin.entries.length,
      totalBytes: acc.totalBytes + bin.totalBytes,
      oversizedBins: acc.oversizedBins + (isOversizedBin(bin, maxBytes) ? 1 : 0),
    }),
    { binCount: 0, totalFiles: 0, totalBytes: 0, oversizedBins: 0 }
  );

export const createDistributionPlan = (
  bins: readonly Bin[],
  maxBytes: number
): DistributionPlan => ({
  bins,
  summary: computeSummary(bins, maxBytes),
});

export const flattenPlan = (plan: DistributionPlan): readonly FileEntry[] =>
  plan.bins.flatMap((bin) => bin.entries);
