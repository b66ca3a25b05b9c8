// src/petscii/shiftState.ts
//
// Two states, two transition bytes. The mode is threaded through the caller's
// loop as a plain value; nothing here holds state between calls.

import type { CharsetTable } from "./charsetTable.js";

export type ShiftMode = "UNSHIFTED" | "SHIFTED";

export const INITIAL_SHIFT_MODE: ShiftMode = "UNSHIFTED";

export type ShiftStep = Readonly<{
  mode: ShiftMode;
  /** True when the byte was a shift control and produces no character. */
  consumed: boolean;
}>;

export function stepShift(table: CharsetTable, mode: ShiftMode, byte: number): ShiftStep {
  if (byte === table.shiftOut) return { mode: "SHIFTED", consumed: true };
  if (byte === table.shiftIn) return { mode: "UNSHIFTED", consumed: true };
  return { mode, consumed: false };
}

export function isShiftByte(table: CharsetTable, byte: number): boolean {
  return byte === table.shiftOut || byte === table.shiftIn;
}

/** Control bytes the encoder emits to move from `from` to `to`. */
export function transitionBytes(
  table: CharsetTable,
  from: ShiftMode,
  to: ShiftMode,
): ReadonlyArray<number> {
  if (from === to) return [];
  return to === "SHIFTED" ? [table.shiftOut] : [table.shiftIn];
}
