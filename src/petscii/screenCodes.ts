// src/petscii/screenCodes.ts
//
// Screen codes are what the VIC-II reads from screen memory. Bit 7 selects
// reverse video; the low seven bits index the character ROM.
//
//   PETSCII     screen code
//   $20-$3F  -> $20-$3F
//   $40-$5F  -> $00-$1F
//   $60-$7F  -> $40-$5F
//   $A0-$BF  -> $60-$7F
//   $C0-$DF  -> $40-$5F
//   $E0-$FE  -> $60-$7E
//   $FF      -> $5E
//
// Control codes ($00-$1F, $80-$9F) have no screen code.

import { InvalidByteError, NotDisplayableError } from "./errors.js";
import { FixedString } from "./fixedString.js";

export type ScreenCell = Readonly<{
  byte: number; // canonical PETSCII code
  reverse: boolean;
}>;

function checkByte(v: number): void {
  if (!Number.isInteger(v) || v < 0 || v > 0xff) throw new InvalidByteError(v);
}

export function petsciiToScreenCode(byte: number): number | undefined {
  checkByte(byte);
  if (byte === 0xff) return 0x5e;
  if (byte >= 0x20 && byte <= 0x3f) return byte;
  if (byte >= 0x40 && byte <= 0x5f) return byte - 0x40;
  if (byte >= 0x60 && byte <= 0x7f) return byte - 0x20;
  if (byte >= 0xa0 && byte <= 0xbf) return byte - 0x40;
  if (byte >= 0xc0) return byte - 0x80;
  return undefined;
}

/** Alias ranges ($60-$7F, $E0-$FF) never come back out; $40-$5F maps to $C0-$DF. */
export function screenCodeToPetscii(code: number): ScreenCell {
  checkByte(code);
  const reverse = (code & 0x80) !== 0;
  const c = code & 0x7f;

  let byte: number;
  if (c < 0x20) byte = c + 0x40;
  else if (c < 0x40) byte = c;
  else if (c < 0x60) byte = c + 0x80;
  else byte = c + 0x40;

  return { byte, reverse };
}

export function fixedStringToScreenCodes<N extends number>(
  str: FixedString<N>,
  opts?: Readonly<{ reverse?: boolean }>,
): FixedString<N> {
  const bits = opts?.reverse === true ? 0x80 : 0;
  const out = Array.from(str, (b) => {
    const code = petsciiToScreenCode(b);
    if (code === undefined) throw new NotDisplayableError(b);
    return code | bits;
  });
  return FixedString.fromBytes(str.length, out);
}

/** Reverse-video flags are dropped; PETSCII strings carry them as control codes instead. */
export function screenCodesToFixedString<N extends number>(codes: FixedString<N>): FixedString<N> {
  const out = Array.from(codes, (c) => screenCodeToPetscii(c).byte);
  return FixedString.fromBytes(codes.length, out);
}
