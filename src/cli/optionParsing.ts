import { Effect, pipe } from "effect";
import { parseSize } from "@lib/parseSize";
import {
  InvalidConfig,
  normalizeExtensions,
  parseSeed,
  validateLimits,
  type DistributeConfig
} from "@domain/DistributeConfig";

export const splitCommaSeparated = (value: string | undefined): string[] =>
  value
    ? value
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s.length > 0)
    : [];

export const parseDistributeOptions = (options: {
  maxFiles: number;
  maxBytes: string;
  seed: string | undefined;
  extensions: string;
}): Effect.Effect<DistributeConfig, InvalidConfig> =>
  Effect.gen(function* () {
    const maxBytes = yield* pipe(
      parseSize(options.maxBytes),
      Effect.mapError(
        (e) => new InvalidConfig({ field: "maxBytes", value: e.input, reason: e.reason })
      )
    );
    const limits = yield* validateLimits({ maxCount: options.maxFiles, maxBytes });
    const extensions = yield* normalizeExtensions(splitCommaSeparated(options.extensions));
    const seed = options.seed === undefined ? undefined : yield* parseSeed(options.seed);

    return { ...limits, extensions, seed };
  });

export const parseConcurrency = (value: number): Effect.Effect<number, InvalidConfig> =>
  Number.isInteger(value) && value >= 1
    ? Effect.succeed(value)
    : Effect.fail(
        new InvalidConfig({
          field: "concurrency",
          value: String(value),
          reason: "must be an integer greater than 0"
        })
      );
