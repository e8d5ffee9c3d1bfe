import { Data, Effect } from "effect";

export const DEFAULT_MAX_COUNT = 1200;
export const DEFAULT_MAX_BYTES = 4 * 1024 * 1024 * 1024;
export const DEFAULT_EXTENSIONS: readonly string[] = ["jpg", "jpeg"];

export const MAX_SEED = (1n << 64n) - 1n;

export class InvalidConfig extends Data.TaggedError("InvalidConfig")<{
  readonly field: string;
  readonly value: string;
  readonly reason: string;
}> {}

export interface PackingLimits {
  readonly maxCount: number;
  readonly maxBytes: number;
}

export interface DistributeConfig extends PackingLimits {
  readonly seed?: bigint;
  readonly extensions: ReadonlySet<string>;
}

export const validateLimits = (limits: PackingLimits): Effect.Effect<PackingLimits, InvalidConfig> => {
  if (!Number.isInteger(limits.maxCount) || limits.maxCount < 1) {
    return Effect.fail(
      new InvalidConfig({
        field: "maxCount",
        value: String(limits.maxCount),
        reason: "must be an integer greater than 0"
      })
    );
  }

  if (!Number.isSafeInteger(limits.maxBytes) || limits.maxBytes < 1) {
    return Effect.fail(
      new InvalidConfig({
        field: "maxBytes",
        value: String(limits.maxBytes),
        reason: "must be an integer greater than 0"
      })
    );
  }

  return Effect.succeed(limits);
};

export const validateSeed = (seed: bigint): Effect.Effect<bigint, InvalidConfig> =>
  seed < 0n || seed > MAX_SEED
    ? Effect.fail(
        new InvalidConfig({
          field: "seed",
          value: seed.toString(),
          reason: "must be an unsigned 64-bit integer"
        })
      )
    : Effect.succeed(seed);

export const parseSeed = (input: string): Effect.Effect<bigint, InvalidConfig> => {
  const trimmed = input.trim();

  if (!/^\d+$/.test(trimmed)) {
    return Effect.fail(
      new InvalidConfig({ field: "seed", value: input, reason: "must be a decimal integer" })
    );
  }

  return validateSeed(BigInt(trimmed));
};

/**
 * Lower-cases extensions and strips a leading dot: ".JPG" and "jpg" are the same.
 */
export const normalizeExtensions = (
  extensions: readonly string[]
): Effect.Effect<ReadonlySet<string>, InvalidConfig> => {
  const normalized = new Set(
    extensions
      .map((ext) => ext.trim().replace(/^\.+/, "").toLowerCase())
      .filter((ext) => ext.length > 0)
  );

  return normalized.size === 0
    ? Effect.fail(
        new InvalidConfig({
          field: "extensions",
          value: extensions.join(","),
          reason: "at least one file extension is required"
        })
      )
    : Effect.succeed(normalized);
};
