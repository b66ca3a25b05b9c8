// src/petscii/fixedString.ts
import { formatDebug } from "./debugFormat.js";
import {
  InvalidByteError,
  LengthMismatchError,
  captureResult,
  type Result,
} from "./errors.js";

export type ByteSource = Uint8Array | ReadonlyArray<number>;

/** What to do with input longer than the target length. */
export type OverflowPolicy = "fail" | "truncate";

export type PadOptions = Readonly<{
  fill: number;
  overflow: OverflowPolicy;
}>;

export function assertFixedLength(length: number): void {
  if (!Number.isInteger(length) || length < 0) {
    throw new Error(`Invalid fixed string length: ${length}`);
  }
}

function copyBytes(bytes: ByteSource, count: number): Uint8Array {
  const out = new Uint8Array(count);
  for (let i = 0; i < count; i++) {
    const v = bytes[i];
    if (v === undefined || !Number.isInteger(v) || v < 0 || v > 0xff) {
      throw new InvalidByteError(v);
    }
    out[i] = v;
  }
  return out;
}

/**
 * An immutable run of exactly N 8-bit code units.
 *
 * The length is part of the type (`FixedString<16>` for a disk name) and is
 * checked again at run time. Nothing pads or truncates unless the caller asks
 * for it through {@link FixedString.fromBytesPadded}.
 */
export class FixedString<N extends number = number> implements Iterable<number> {
  private constructor(
    public readonly length: N,
    private readonly data: Uint8Array,
  ) {}

  public static fromBytes<N extends number>(length: N, bytes: ByteSource): FixedString<N> {
    assertFixedLength(length);
    if (bytes.length !== length) throw new LengthMismatchError(length, bytes.length);
    return new FixedString(length, copyBytes(bytes, length));
  }

  public static fromBytesPadded<N extends number>(
    length: N,
    bytes: ByteSource,
    opts: PadOptions,
  ): FixedString<N> {
    assertFixedLength(length);
    if (!Number.isInteger(opts.fill) || opts.fill < 0 || opts.fill > 0xff) {
      throw new InvalidByteError(opts.fill);
    }
    if (bytes.length > length && opts.overflow === "fail") {
      throw new LengthMismatchError(length, bytes.length);
    }

    const kept = Math.min(bytes.length, length);
    const out = new Uint8Array(length).fill(opts.fill);
    out.set(copyBytes(bytes, kept));
    return new FixedString(length, out);
  }

  public static compare(a: FixedString, b: FixedString): number {
    return a.compare(b);
  }

  public at(index: number): number | undefined {
    return this.data[index];
  }

  /** A copy of the bytes; changing it does not touch this string. */
  public toBytes(): Uint8Array {
    return this.data.slice();
  }

  public [Symbol.iterator](): Iterator<number> {
    return this.data[Symbol.iterator]();
  }

  public equals(other: FixedString): boolean {
    return this.compare(other) === 0;
  }

  /** Byte-wise ordering; a shorter string sorts before a longer one it prefixes. */
  public compare(other: FixedString): number {
    const n = Math.min(this.length, other.length);
    for (let i = 0; i < n; i++) {
      const a = this.data[i] ?? 0;
      const b = other.data[i] ?? 0;
      if (a !== b) return a < b ? -1 : 1;
    }
    if (this.length === other.length) return 0;
    return this.length < other.length ? -1 : 1;
  }

  public toString(): string {
    return formatDebug(this);
  }
}

export function tryFixedString<N extends number>(
  length: N,
  bytes: ByteSource,
): Result<FixedString<N>> {
  return captureResult(() => FixedString.fromBytes(length, bytes));
}
