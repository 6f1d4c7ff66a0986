// src/region/errors.ts

export type WarnFn = (msg: string) => void;

export type RegionErrorKind = "NotFound" | "CorruptFormat" | "CorruptPayload";

export abstract class RegionError extends Error {
  public abstract readonly kind: RegionErrorKind;
}

/** Chunk slot is empty, or the region file does not exist. */
export class NotFoundError extends RegionError {
  public readonly kind = "NotFound";

  public constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export type CorruptFormatDetails = Readonly<{
  offset?: number;
  expected?: number;
}>;

export class CorruptFormatError extends RegionError {
  public readonly kind = "CorruptFormat";
  public readonly offset: number | undefined;
  public readonly expected: number | undefined;

  public constructor(message: string, details: CorruptFormatDetails = {}) {
    super(message);
    this.name = "CorruptFormatError";
    this.offset = details.offset;
    this.expected = details.expected;
  }
}

/** Decompression or BSON deserialization failed. */
export class CorruptPayloadError extends RegionError {
  public readonly kind = "CorruptPayload";

  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CorruptPayloadError";
  }
}

export function isRegionError(err: unknown): err is RegionError {
  return err instanceof RegionError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
