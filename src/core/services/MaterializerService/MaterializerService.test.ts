import { describe, expect, test } from "vitest"
import { Effect, Either, Layer, pipe } from "effect"

import { createTestContext, type TestContext } from "@test/TestContext"
import type { Bin } from "@domain/DistributionPlan"
import { createBin, createDistributionPlan } from "@domain/DistributionPlan"
import type { FileEntry } from "@domain/FileEntry"
import {
  MaterializerServiceLive,
  MaterializerServiceTag,
  binDirectory,
  type MaterializeOptions,
} from "./MaterializerService"

const entry = (name: string, sizeBytes: number): FileEntry => ({
  id: `/photos/${name}`,
  name,
  sizeBytes,
})

const samplePlan = () =>
  createDistributionPlan(
    [
      createBin(1, [entry("c.jpg", 30), entry("a.jpg", 10)]),
      createBin(2, [entry("b.jpg", 20)]),
    ],
    100
  )

const setup = () => {
  const ctx = createTestContext()
  ctx.addDirectory("/photos")
  ctx.addFile("/photos/a.jpg", 10)
  ctx.addFile("/photos/b.jpg", 20)
  ctx.addFile("/photos/c.jpg", 30)
  ctx.addDirectory("/out")
  return ctx
}

const materialize = (ctx: TestContext, options?: MaterializeOptions) =>
  pipe(
    MaterializerServiceTag,
    Effect.flatMap((svc) => svc.materialize(samplePlan(), "/out", options)),
    Effect.provide(pipe(MaterializerServiceLive, Layer.provide(ctx.layer))),
    Effect.either,
    Effect.runPromise
  )

describe("binDirectory", () => {
  test("names folders by bin index", () => {
    expect(binDirectory("/out", createBin(12, []))).toBe("/out/12")
  })
})

describe("MaterializerService", () => {
  test("copies each bin into its numbered folder", async () => {
    const ctx = setup()

    const result = await materialize(ctx)

    expect(Either.isRight(result) && result.right).toEqual({
      binsCreated: 2,
      filesCopied: 3,
      bytesCopied: 60,
    })
    expect(ctx.childrenOf("/out")).toEqual(["1", "2"])
    expect(ctx.childrenOf("/out/1")).toEqual(["a.jpg", "c.jpg"])
    expect(ctx.childrenOf("/out/2")).toEqual(["b.jpg"])
    expect(ctx.files.get("/out/1/c.jpg")?.size).toBe(30)
  })

  test("copies entries of a bin in plan order", async () => {
    const ctx = setup()

    await materialize(ctx, { concurrency: 1 })

    expect(ctx.calls.copy).toEqual([
      { method: "copy", source: "/photos/c.jpg", destination: "/out/1/c.jpg" },
      { method: "copy", source: "/photos/a.jpg", destination: "/out/1/a.jpg" },
      { method: "copy", source: "/photos/b.jpg", destination: "/out/2/b.jpg" },
    ])
  })

  test("calls onBinComplete once per bin with its folder", async () => {
    const ctx = setup()
    const completed: Array<[number, string]> = []

    await materialize(ctx, {
      concurrency: 1,
      onBinComplete: (bin: Bin, directory: string) =>
        Effect.sync(() => {
          completed.push([bin.index, directory])
        }),
    })

    expect(completed).toEqual([
      [1, "/out/1"],
      [2, "/out/2"],
    ])
  })

  test("fails when a source file has vanished", async () => {
    const ctx = setup()
    ctx.files.delete("/photos/b.jpg")

    const result = await materialize(ctx, { concurrency: 1 })

    expect(Either.isLeft(result) && result.left).toMatchObject({
      _tag: "CopySourceNotFound",
      path: "/photos/b.jpg",
    })
  })

  test("surfaces a full disk", async () => {
    const ctx = setup()
    ctx.fillDisk("/out/2")

    const result = await materialize(ctx, { concurrency: 1 })

    expect(Either.isLeft(result) && result.left).toMatchObject({
      _tag: "CopyDiskFull",
      path: "/out/2/b.jpg",
    })
  })

  test("maps folder creation failures to DestinationUnwritable", async () => {
    const ctx = setup()
    ctx.denyPermission("/out")

    const result = await materialize(ctx, { concurrency: 1 })

    expect(Either.isLeft(result) && result.left).toMatchObject({
      _tag: "DestinationUnwritable",
      path: "/out/1",
      reason: "permission denied",
    })
  })
})
