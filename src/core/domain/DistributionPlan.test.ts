import { describe, expect, test } from "vitest"
import type { FileEntry } from "./FileEntry"
import { compareById, totalSize } from "./FileEntry"
import {
  computeSummary,
  createBin,
  createDistributionPlan,
  flattenPlan,
  isOversizedBin,
} from "./DistributionPlan"

const entry = (name: string, sizeBytes: number): FileEntry => ({
  id: `/photos/${name}`,
  name,
  sizeBytes,
})

describe("FileEntry helpers", () => {
  test("compareById orders by code unit", () => {
    const entries = [entry("b.jpg", 1), entry("B.jpg", 1), entry("a.jpg", 1)]
    expect([...entries].sort(compareById).map((e) => e.name)).toEqual(["B.jpg", "a.jpg", "b.jpg"])
  })

  test("totalSize sums sizes", () => {
    expect(totalSize([])).toBe(0)
    expect(totalSize([entry("a.jpg", 3), entry("b.jpg", 4)])).toBe(7)
  })
})

describe("createBin", () => {
  test("records index, entries and total bytes", () => {
    const bin = createBin(3, [entry("a.jpg", 10), entry("b.jpg", 20)])
    expect(bin.index).toBe(3)
    expect(bin.entries.map((e) => e.name)).toEqual(["a.jpg", "b.jpg"])
    expect(bin.totalBytes).toBe(30)
  })
})

describe("isOversizedBin", () => {
  test("is true only for a single file over the cap", () => {
    expect(isOversizedBin(createBin(1, [entry("big.jpg", 101)]), 100)).toBe(true)
    expect(isOversizedBin(createBin(1, [entry("fits.jpg", 100)]), 100)).toBe(false)
    expect(isOversizedBin(createBin(1, [entry("a.jpg", 60), entry("b.jpg", 60)]), 100)).toBe(false)
  })
})

describe("computeSummary", () => {
  test("is all zeros for no bins", () => {
    expect(computeSummary([], 100)).toEqual({
      binCount: 0,
      totalFiles: 0,
      totalBytes: 0,
      oversizedBins: 0,
    })
  })

  test("counts bins, files, bytes and oversized bins", () => {
    const bins = [
      createBin(1, [entry("a.jpg", 40), entry("b.jpg", 50)]),
      createBin(2, [entry("big.jpg", 500)]),
      createBin(3, [entry("c.jpg", 10)]),
    ]
    expect(computeSummary(bins, 100)).toEqual({
      binCount: 3,
      totalFiles: 4,
      totalBytes: 600,
      oversizedBins: 1,
    })
  })
})

describe("createDistributionPlan / flattenPlan", () => {
  test("flattening returns entries in bin then copy order", () => {
    const plan = createDistributionPlan(
      [createBin(1, [entry("c.jpg", 1), entry("a.jpg", 1)]), createBin(2, [entry("b.jpg", 1)])],
      10
    )
    expect(plan.summary.binCount).toBe(2)
    expect(flattenPlan(plan).map((e) => e.name)).toEqual(["c.jpg", "a.jpg", "b.jpg"])
  })
})
