/**
 * Tests for error handling - verify domain errors are converted to user-friendly messages.
 */

import { describe, expect, test } from "vitest"
import { InvalidConfig } from "@domain/DistributeConfig"
import { SourceUnreadable, EmptySource } from "@services/InventoryService"
import { DestinationNotEmpty, DestinationUnwritable } from "@services/DestinationService"
import {
  CopySourceNotFound,
  CopyPermissionDenied,
  CopyDestinationExists,
  CopyDiskFull,
  CopyFailed,
} from "@services/FileCopyService"
import {
  AppError,
  fromDomainError,
  invalidConfig,
  emptySource,
  destinationNotEmpty,
  diskFull,
} from "./errors"

describe("AppError", () => {
  test("format() lays out title, detail and hint", () => {
    const error = new AppError("Test Error", "Something went wrong.", "Try doing X instead.")

    expect(error.format()).toBe(
      ["ERROR: Test Error", "", "   Something went wrong.", "", "   Hint: Try doing X instead."].join("\n")
    )
    expect(error.message).toBe("Test Error: Something went wrong.")
  })
})

describe("Domain error constructors", () => {
  test("invalidConfig names the flag", () => {
    const error = invalidConfig("maxCount", "0", "must be an integer greater than 0")

    expect(error.title).toBe("Invalid option")
    expect(error.detail).toBe('--max-files must be an integer greater than 0 (got "0").')
  })

  test("invalidConfig falls back to the field for unknown names", () => {
    expect(invalidConfig("other", "x", "is wrong").detail).toBe('other is wrong (got "x").')
  })

  test("emptySource lists the extensions with dots", () => {
    const error = emptySource("/photos", ["jpg", "jpeg"])

    expect(error.title).toBe("No photos found")
    expect(error.detail).toBe('No files with extension .jpg, .jpeg in "/photos".')
  })

  test("destinationNotEmpty uses singular and plural", () => {
    expect(destinationNotEmpty("/out", 1).detail).toBe('"/out" already contains 1 entry.')
    expect(destinationNotEmpty("/out", 3).detail).toBe('"/out" already contains 3 entries.')
  })

  test("diskFull suggests a smaller folder size", () => {
    expect(diskFull("/out/1/a.jpg").suggestion).toContain("--max-bytes")
  })
})

describe("fromDomainError", () => {
  test("maps each domain error to its title", () => {
    const cases: Array<[unknown, string]> = [
      [new InvalidConfig({ field: "seed", value: "x", reason: "must be a decimal integer" }), "Invalid option"],
      [new SourceUnreadable({ path: "/photos", reason: "permission denied" }), "Cannot read source folder"],
      [new EmptySource({ path: "/photos", extensions: ["jpg"] }), "No photos found"],
      [new DestinationNotEmpty({ path: "/out", entryCount: 2 }), "Destination folder is not empty"],
      [new DestinationUnwritable({ path: "/out", reason: "permission denied" }), "Cannot write to destination"],
      [new CopySourceNotFound({ path: "/photos/a.jpg" }), "Source file missing"],
      [new CopyPermissionDenied({ path: "/out/1/a.jpg" }), "Permission denied"],
      [new CopyDestinationExists({ path: "/out/1/a.jpg" }), "Unexpected file in destination"],
      [new CopyDiskFull({ path: "/out/1/a.jpg" }), "Disk full"],
      [
        new CopyFailed({ source: "/photos/a.jpg", destination: "/out/1/a.jpg", reason: "EIO" }),
        "Copy failed",
      ],
    ]

    for (const [error, title] of cases) {
      expect(fromDomainError(error).title).toBe(title)
    }
  })

  test("carries the context of the domain error into the detail", () => {
    const error = fromDomainError(new SourceUnreadable({ path: "/photos", reason: "not a directory" }))

    expect(error.detail).toBe('Could not read "/photos": not a directory.')
  })

  test("passes AppError through unchanged", () => {
    const original = new AppError("Title", "Detail", "Hint")
    expect(fromDomainError(original)).toBe(original)
  })

  test("recognises permission errors in plain errors", () => {
    expect(fromDomainError(new Error("EACCES: permission denied, open '/x'")).title).toBe(
      "Permission denied"
    )
  })

  test("wraps anything else as unexpected", () => {
    expect(fromDomainError(new Error("boom"))).toMatchObject({
      title: "Unexpected error",
      detail: "boom",
    })
    expect(fromDomainError("plain string").detail).toBe("plain string")
    expect(fromDomainError({ _tag: "SomethingElse" }).title).toBe("Unexpected error")
  })
})
