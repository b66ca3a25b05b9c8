// src/petscii/debugFormat.ts
//
// Static dumps for people reading raw records. Glyphs always come from the
// unshifted set and shift bytes are shown like any other control code, so the
// output depends only on the bytes.

import { lookupByte, type CharsetTable } from "./charsetTable.js";
import type { FixedString } from "./fixedString.js";
import { PETSCII_C64 } from "./petsciiC64.js";

export const GLYPH_PLACEHOLDER = "·";

export type DebugFormatOptions = Readonly<{
  table?: CharsetTable;
}>;

export type HexDumpOptions = Readonly<{
  table?: CharsetTable;
  width?: number; // bytes per row, default 16
}>;

function hex2(b: number): string {
  return b.toString(16).padStart(2, "0");
}

export function debugGlyph(table: CharsetTable, byte: number): string {
  const m = lookupByte(table, "UNSHIFTED", byte);
  return m.kind === "printable" ? m.char : GLYPH_PLACEHOLDER;
}

/** `FixedString<5> [41 42 43 44 8e] |ABCD·|` */
export function formatDebug(str: FixedString, opts?: DebugFormatOptions): string {
  const table = opts?.table ?? PETSCII_C64;
  const bytes = Array.from(str);
  const hex = bytes.map(hex2).join(" ");
  const glyphs = bytes.map((b) => debugGlyph(table, b)).join("");
  return `FixedString<${str.length}> [${hex}] |${glyphs}|`;
}

export function formatHexDump(str: FixedString, opts?: HexDumpOptions): string {
  const table = opts?.table ?? PETSCII_C64;
  const width = opts?.width ?? 16;
  if (!Number.isInteger(width) || width < 1) throw new Error(`Invalid dump width: ${width}`);

  const bytes = str.toBytes();
  const lines: string[] = [];
  for (let offset = 0; offset < bytes.length; offset += width) {
    const row = Array.from(bytes.subarray(offset, offset + width));
    const hex = row.map(hex2).join(" ").padEnd(width * 3 - 1, " ");
    const glyphs = row.map((b) => debugGlyph(table, b)).join("");
    lines.push(`${offset.toString(16).padStart(4, "0")}  ${hex}  |${glyphs}|`);
  }
  return lines.join("\n");
}
