import { Data, Effect } from "effect";

/**
 * Byte sizes for CLI flags, always binary multiples.
 *
 * @example
 *   parseSize("4GiB") // 4294967296
 *   parseSize("1.5M") // 1572864
 *   parseSize("1024") // 1024
 */

const KiB = 1024;
const MiB = KiB * 1024;
const GiB = MiB * 1024;
const TiB = GiB * 1024;

const UNITS: Record<string, number> = {
  b: 1,
  k: KiB,
  kb: KiB,
  kib: KiB,
  m: MiB,
  mb: MiB,
  mib: MiB,
  g: GiB,
  gb: GiB,
  gib: GiB,
  t: TiB,
  tb: TiB,
  tib: TiB
};

export class InvalidSizeFormat extends Data.TaggedError("InvalidSizeFormat")<{
  readonly input: string;
  readonly reason: string;
}> {}

export const parseSize = (input: string): Effect.Effect<number, InvalidSizeFormat> => {
  const trimmed = input.trim().toLowerCase();

  if (/^\d+$/.test(trimmed)) {
    return Effect.succeed(parseInt(trimmed, 10));
  }

  const match = trimmed.match(/^(\d+(?:\.\d+)?)\s*([a-z]+)$/);
  const numStr = match?.[1];
  const unit = match?.[2];

  if (!numStr || !unit) {
    return Effect.fail(
      new InvalidSizeFormat({ input, reason: "use formats like 500MiB, 4GiB or raw bytes" })
    );
  }

  const multiplier = UNITS[unit];
  if (multiplier === undefined) {
    return Effect.fail(
      new InvalidSizeFormat({ input, reason: `unknown unit "${unit}", use B, KiB, MiB, GiB, TiB` })
    );
  }

  return Effect.succeed(Math.floor(parseFloat(numStr) * multiplier));
};

export const formatSize = (bytes: number): string => {
  if (bytes < KiB) return `${bytes} B`;
  if (bytes < MiB) return `${(bytes / KiB).toFixed(1)} KiB`;
  if (bytes < GiB) return `${(bytes / MiB).toFixed(1)} MiB`;
  if (bytes < TiB) return `${(bytes / GiB).toFixed(2)} GiB`;
  return `${(bytes / TiB).toFixed(2)} TiB`;
};
