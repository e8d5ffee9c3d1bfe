import { describe, expect, test } from "vitest"
import { Effect, Either } from "effect"
import {
  DEFAULT_EXTENSIONS,
  DEFAULT_MAX_BYTES,
  DEFAULT_MAX_COUNT,
  InvalidConfig,
  MAX_SEED,
  normalizeExtensions,
  parseSeed,
  validateLimits,
  validateSeed,
} from "./DistributeConfig"

const failure = <A>(effect: Effect.Effect<A, InvalidConfig>): InvalidConfig => {
  const result = Effect.runSync(Effect.either(effect))
  if (Either.isRight(result)) throw new Error("expected InvalidConfig")
  return result.left
}

describe("defaults", () => {
  test("match the documented values", () => {
    expect(DEFAULT_MAX_COUNT).toBe(1200)
    expect(DEFAULT_MAX_BYTES).toBe(4294967296)
    expect(DEFAULT_EXTENSIONS).toEqual(["jpg", "jpeg"])
  })
})

describe("validateLimits", () => {
  test("accepts positive integers", () => {
    expect(Effect.runSync(validateLimits({ maxCount: 1, maxBytes: 1 }))).toEqual({
      maxCount: 1,
      maxBytes: 1,
    })
  })

  test("rejects a zero count", () => {
    const error = failure(validateLimits({ maxCount: 0, maxBytes: 100 }))
    expect(error).toBeInstanceOf(InvalidConfig)
    expect(error.field).toBe("maxCount")
    expect(error.value).toBe("0")
    expect(error.reason).toBe("must be an integer greater than 0")
  })

  test("rejects a fractional count", () => {
    expect(failure(validateLimits({ maxCount: 2.5, maxBytes: 100 })).field).toBe("maxCount")
  })

  test("rejects non-positive or unsafe byte caps", () => {
    expect(failure(validateLimits({ maxCount: 10, maxBytes: 0 })).field).toBe("maxBytes")
    expect(failure(validateLimits({ maxCount: 10, maxBytes: -5 })).value).toBe("-5")
    expect(failure(validateLimits({ maxCount: 10, maxBytes: Number.MAX_SAFE_INTEGER + 2 })).field).toBe(
      "maxBytes"
    )
  })
})

describe("validateSeed", () => {
  test("accepts the full unsigned 64-bit range", () => {
    expect(Effect.runSync(validateSeed(0n))).toBe(0n)
    expect(Effect.runSync(validateSeed(MAX_SEED))).toBe(18446744073709551615n)
  })

  test("rejects values outside the range", () => {
    const tooLarge = failure(validateSeed(MAX_SEED + 1n))
    expect(tooLarge.field).toBe("seed")
    expect(tooLarge.value).toBe("18446744073709551616")
    expect(tooLarge.reason).toBe("must be an unsigned 64-bit integer")
    expect(failure(validateSeed(-1n)).value).toBe("-1")
  })
})

describe("parseSeed", () => {
  test("parses decimal integers beyond Number precision", () => {
    expect(Effect.runSync(parseSeed("18446744073709551615"))).toBe(MAX_SEED)
    expect(Effect.runSync(parseSeed(" 42 "))).toBe(42n)
  })

  test("rejects non-decimal input", () => {
    for (const input of ["", "abc", "-1", "1e5", "0x10", "1.5"]) {
      const error = failure(parseSeed(input))
      expect(error.field).toBe("seed")
      expect(error.value).toBe(input)
      expect(error.reason).toBe("must be a decimal integer")
    }
  })

  test("rejects values past 2^64 - 1", () => {
    expect(failure(parseSeed("18446744073709551616")).reason).toBe(
      "must be an unsigned 64-bit integer"
    )
  })
})

describe("normalizeExtensions", () => {
  test("lower-cases, strips dots and drops duplicates", () => {
    const result = Effect.runSync(normalizeExtensions([".JPG", "jpeg", " Jpg ", ""]))
    expect([...result]).toEqual(["jpg", "jpeg"])
  })

  test("fails when nothing usable remains", () => {
    const error = failure(normalizeExtensions([" ", "."]))
    expect(error.field).toBe("extensions")
    expect(error.value).toBe(" ,.")
    expect(error.reason).toBe("at least one file extension is required")
  })
})
