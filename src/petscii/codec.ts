// src/petscii/codec.ts
//
// Decode is total:
// - shift bytes change the mode and produce nothing
// - printable bytes produce their scalar in the current mode
// - control bytes produce the C0/C1 control with the same value (0x93 -> U+0093)
// - unmapped bytes produce U+E000 + byte
// Encode accepts those last two forms back, shifting into a mode where the byte is
// unmapped when it has to, so no byte is lost on a decode/encode trip unless it was
// a shift byte.

import {
  isControlByte,
  lookupByte,
  lookupScalar,
  type CharsetTable,
} from "./charsetTable.js";
import {
  LengthExceededError,
  LengthMismatchError,
  UnmappableCharacterError,
  captureResult,
  type Result,
} from "./errors.js";
import { FixedString, assertFixedLength } from "./fixedString.js";
import { PETSCII_C64, PETSCII_SPACE } from "./petsciiC64.js";
import {
  INITIAL_SHIFT_MODE,
  isShiftByte,
  stepShift,
  transitionBytes,
  type ShiftMode,
} from "./shiftState.js";

export const PRIVATE_USE_BASE = 0xe000;

export type LengthPolicy = "fail" | "pad" | "truncate";

export type DecodeOptions = Readonly<{
  table?: CharsetTable;
  /** Trailing runs of this byte are dropped before decoding (0xA0 for disk names). */
  stripTrailing?: number;
}>;

export type EncodeOptions = Readonly<{
  table?: CharsetTable;
  policy?: LengthPolicy; // default "fail"
  fill?: number; // default 0x20, used by "pad" and "truncate"
}>;

function decodeDataByte(table: CharsetTable, mode: ShiftMode, byte: number): string {
  const m = lookupByte(table, mode, byte);
  switch (m.kind) {
    case "printable":
      return m.char;
    case "control":
      return String.fromCodePoint(byte);
    case "unmapped":
      return String.fromCodePoint(PRIVATE_USE_BASE + byte);
  }
}

export function decodePetscii(str: FixedString, opts?: DecodeOptions): string {
  const table = opts?.table ?? PETSCII_C64;
  const bytes = str.toBytes();

  let end = bytes.length;
  if (opts?.stripTrailing !== undefined) {
    while (end > 0 && bytes[end - 1] === opts.stripTrailing) end--;
  }

  let mode: ShiftMode = INITIAL_SHIFT_MODE;
  let out = "";
  for (const byte of bytes.subarray(0, end)) {
    const step = stepShift(table, mode, byte);
    mode = step.mode;
    if (step.consumed) continue;
    out += decodeDataByte(table, mode, byte);
  }
  return out;
}

/** Decodes a whole byte buffer as one record of its own length. */
export function decodePetsciiBytes(bytes: Uint8Array, opts?: DecodeOptions): string {
  return decodePetscii(FixedString.fromBytes(bytes.length, bytes), opts);
}

type RawPick = Readonly<{ byte: number; mode: ShiftMode }>;

function rawByteFor(table: CharsetTable, mode: ShiftMode, scalar: number): RawPick | undefined {
  if (scalar <= 0xff && isControlByte(table, scalar)) {
    return isShiftByte(table, scalar) ? undefined : { byte: scalar, mode };
  }

  const b = scalar - PRIVATE_USE_BASE;
  if (b < 0 || b > 0xff || isControlByte(table, b)) return undefined;

  const other: ShiftMode = mode === "UNSHIFTED" ? "SHIFTED" : "UNSHIFTED";
  for (const m of [mode, other]) {
    if (lookupByte(table, m, b).kind === "unmapped") return { byte: b, mode: m };
  }
  return undefined;
}

/**
 * Encodes without a length limit. Shift bytes are inserted only when the next
 * character has no form in the current mode.
 */
export function encodePetsciiBytes(text: string, opts?: EncodeOptions): Uint8Array {
  const table = opts?.table ?? PETSCII_C64;
  const out: number[] = [];

  let mode: ShiftMode = INITIAL_SHIFT_MODE;
  let index = 0;
  for (const ch of text) {
    const scalar = ch.codePointAt(0) ?? 0;
    const candidates = lookupScalar(table, scalar);
    const pick = candidates.find((c) => c.mode === mode) ?? candidates[0];

    if (pick) {
      out.push(...transitionBytes(table, mode, pick.mode), pick.byte);
      mode = pick.mode;
    } else {
      const raw = rawByteFor(table, mode, scalar);
      if (raw === undefined) throw new UnmappableCharacterError(scalar, index);
      out.push(...transitionBytes(table, mode, raw.mode), raw.byte);
      mode = raw.mode;
    }
    index++;
  }

  return Uint8Array.from(out);
}

export function encodePetscii<N extends number>(
  text: string,
  length: N,
  opts?: EncodeOptions,
): FixedString<N> {
  assertFixedLength(length);
  const policy = opts?.policy ?? "fail";
  const fill = opts?.fill ?? PETSCII_SPACE;
  const bytes = encodePetsciiBytes(text, opts);

  if (bytes.length > length) {
    if (policy !== "truncate") throw new LengthExceededError(bytes.length, length);
    return FixedString.fromBytesPadded(length, bytes, { fill, overflow: "truncate" });
  }
  if (bytes.length < length && policy === "fail") {
    throw new LengthMismatchError(length, bytes.length);
  }
  return FixedString.fromBytesPadded(length, bytes, { fill, overflow: "fail" });
}

export function tryEncodePetscii<N extends number>(
  text: string,
  length: N,
  opts?: EncodeOptions,
): Result<FixedString<N>> {
  return captureResult(() => encodePetscii(text, length, opts));
}
