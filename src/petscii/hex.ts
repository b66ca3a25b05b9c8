// src/petscii/hex.ts
import { InvalidByteError } from "./errors.js";

const BYTE_TOKEN = /^(?:0x|\$)?([0-9a-f]{1,2})$/i;

/** Parses "41 42 0x43 $44" (spaces or commas between tokens). */
export function parseHexBytes(text: string): Uint8Array {
  const tokens = text.split(/[\s,]+/).filter((t) => t.length > 0);
  const out = tokens.map((t) => {
    const m = BYTE_TOKEN.exec(t);
    const digits = m?.[1];
    if (digits === undefined) throw new InvalidByteError(t);
    return Number.parseInt(digits, 16);
  });
  return Uint8Array.from(out);
}

export function formatHexBytes(bytes: Iterable<number>): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join(" ");
}
