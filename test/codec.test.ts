import { describe, expect, it } from "vitest";
import { readFileSync } from "node:fs";

import { parseCharsetTableJson, parseCharsetTableJsonV1 } from "../src/petscii/charsetTable.js";
import {
  decodePetscii,
  decodePetsciiBytes,
  encodePetscii,
  encodePetsciiBytes,
  tryEncodePetscii,
} from "../src/petscii/codec.js";
import {
  LengthExceededError,
  LengthMismatchError,
  UnmappableCharacterError,
} from "../src/petscii/errors.js";
import { FixedString } from "../src/petscii/fixedString.js";
import { PETSCII_C64, PETSCII_C64_TABLE_PATH } from "../src/petscii/petsciiC64.js";

function fs(bytes: number[]): FixedString {
  return FixedString.fromBytes(bytes.length, bytes);
}

function bytesOf(str: FixedString): number[] {
  return Array.from(str);
}

describe("decodePetscii", () => {
  it("decodes the PETSCII punctuation that differs from ASCII", () => {
    expect(decodePetscii(fs([0x41, 0x42, 0x43, 0x5c, 0x5e, 0x5f]))).toBe("ABC£↑←");
  });

  it("drops a trailing shift-in and keeps the other bytes", () => {
    const s = FixedString.fromBytes(5, [0x41, 0x42, 0x43, 0x44, 0x8e]);
    expect(decodePetscii(s)).toBe("ABCD");
  });

  it("decodes X under shifted and Y under unshifted in [0x0E, X, 0x8E, Y]", () => {
    for (const x of [0x41, 0x5a, 0xc1, 0xde, 0xba]) {
      for (const y of [0x41, 0xc1, 0x5c]) {
        const expected =
          decodePetscii(fs([0x0e, x])) + decodePetscii(fs([y]));
        expect(decodePetscii(fs([0x0e, x, 0x8e, y])), `${x} ${y}`).toBe(expected);
      }
    }
    expect(decodePetscii(fs([0x0e, 0x41, 0x8e, 0x41]))).toBe("aA");
  });

  it("does not carry shift state from one call to the next", () => {
    expect(decodePetscii(fs([0x0e, 0x41]))).toBe("a");
    expect(decodePetscii(fs([0x41]))).toBe("A");
  });

  it("is total over every byte value and emits nothing for the two shift bytes", () => {
    const all = fs(Array.from({ length: 256 }, (_, i) => i));
    const text = decodePetscii(all);
    expect(Array.from(text).length).toBe(254);
  });

  it("decodes runs without shift bytes one byte at a time", () => {
    const bytes = Array.from({ length: 256 }, (_, i) => i).filter((b) => b !== 0x0e && b !== 0x8e);
    const whole = decodePetscii(fs(bytes));
    const perByte = bytes.map((b) => decodePetscii(fs([b]))).join("");
    expect(whole).toBe(perByte);
  });

  it("passes control codes through as C0/C1 controls", () => {
    expect(decodePetscii(fs([0x93, 0x05, 0x41, 0x0d]))).toBe("\u0093\u0005A\r");
  });

  it("strips trailing padding on request", () => {
    const s = fs([0x48, 0x49, 0xa0, 0xa0]);
    expect(decodePetscii(s)).toBe("HI\u00a0\u00a0");
    expect(decodePetscii(s, { stripTrailing: 0xa0 })).toBe("HI");
    expect(decodePetscii(fs([0xa0, 0xa0]), { stripTrailing: 0xa0 })).toBe("");
  });

  it("decodes a plain byte buffer as one record", () => {
    expect(decodePetsciiBytes(Uint8Array.from([0x0e, 0x48, 0x49]))).toBe("hi");
  });
});

describe("encodePetscii", () => {
  it("inserts a shift byte only when the next character needs the other set", () => {
    expect(Array.from(encodePetsciiBytes("Hello"))).toEqual([0x48, 0x0e, 0x45, 0x4c, 0x4c, 0x4f]);
    expect(Array.from(encodePetsciiBytes("Hi ♥"))).toEqual([0x48, 0x0e, 0x49, 0x20, 0x8e, 0xd3]);
    expect(Array.from(encodePetsciiBytes("abc"))).toEqual([0x0e, 0x41, 0x42, 0x43]);
  });

  it("stays in shifted mode for capitals once there", () => {
    expect(Array.from(encodePetsciiBytes("aB"))).toEqual([0x0e, 0x41, 0xc2]);
  });

  it("prefers primary codes over alias codes", () => {
    expect(Array.from(encodePetsciiBytes("π─"))).toEqual([0xde, 0xc0]);
  });

  it("fails on overflow under the fail policy", () => {
    expect(() => encodePetscii("Hello", 5)).toThrow(LengthExceededError);
    expect(() => encodePetscii("Hello", 5, { policy: "fail" })).toThrow(
      "Encoded text needs 6 bytes but only 5 are available",
    );
  });

  it("truncates to the first N bytes under the truncate policy", () => {
    const s = encodePetscii("Hello", 5, { policy: "truncate" });
    expect(bytesOf(s)).toEqual([0x48, 0x0e, 0x45, 0x4c, 0x4c]);
    expect(decodePetscii(s)).toBe("Hell");
  });

  it("refuses to truncate under the pad policy", () => {
    const r = tryEncodePetscii("Hello", 5, { policy: "pad", fill: 0x20 });
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error).toMatchObject({ kind: "LengthExceeded", needed: 6, available: 5 });
  });

  it("pads short text with the fill byte under pad and truncate", () => {
    expect(bytesOf(encodePetscii("HI", 5, { policy: "pad", fill: 0x20 }))).toEqual([0x48, 0x49, 0x20, 0x20, 0x20]);
    expect(bytesOf(encodePetscii("HI", 4, { policy: "pad", fill: 0xa0 }))).toEqual([0x48, 0x49, 0xa0, 0xa0]);
    expect(bytesOf(encodePetscii("HI", 3, { policy: "truncate" }))).toEqual([0x48, 0x49, 0x20]);
  });

  it("does not pad short text under the fail policy", () => {
    expect(() => encodePetscii("HI", 5)).toThrow(LengthMismatchError);
  });

  it("rejects characters with no PETSCII form and says which one", () => {
    expect(() => encodePetscii("A€", 2)).toThrow(UnmappableCharacterError);
    expect(() => encodePetscii("A€", 2)).toThrow("Cannot encode character U+20AC at index 1 in PETSCII");

    const r = tryEncodePetscii("x{", 2);
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error).toMatchObject({ kind: "UnmappableCharacter", scalar: 0x7b, index: 1 });
  });

  it("counts the error index in characters, not UTF-16 units", () => {
    const r = tryEncodePetscii("\u{1fb72}€", 2);
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error).toMatchObject({ index: 1 });
  });

  it("refuses shift controls in the text", () => {
    expect(() => encodePetsciiBytes("\u000eA")).toThrow(UnmappableCharacterError);
    expect(() => encodePetsciiBytes("A\u008e")).toThrow(UnmappableCharacterError);
  });

  it("writes other control characters back as raw bytes", () => {
    const bytes = [0x93, 0x05, 0x41, 0x0d];
    const text = decodePetscii(fs(bytes));
    expect(bytesOf(encodePetscii(text, 4))).toEqual(bytes);
  });
});

describe("round trip", () => {
  it("decode(encode(text)) returns the text when it fits exactly", () => {
    const samples = ["Hello, World!", "READY.", "load \"$\",8", "♥ π ─ £ ↑←", "MiXeD CaSe 123", "✓\u{1fb96}"];
    for (const text of samples) {
      const n = encodePetsciiBytes(text).length;
      expect(decodePetscii(encodePetscii(text, n, { policy: "fail" })), text).toBe(text);
    }
  });

  it("round-trips every character in the reverse table on its own", () => {
    for (const scalar of PETSCII_C64.reverse.keys()) {
      const ch = String.fromCodePoint(scalar);
      const n = encodePetsciiBytes(ch).length;
      expect(decodePetscii(encodePetscii(ch, n)), ch).toBe(ch);
    }
  });

  it("round-trips padded text when the padding is stripped on decode", () => {
    const s = encodePetscii("GAMES", 16, { policy: "pad", fill: 0xa0 });
    expect(decodePetscii(s, { stripTrailing: 0xa0 })).toBe("GAMES");
  });
});

describe("unmapped bytes", () => {
  const parsed: unknown = JSON.parse(readFileSync(PETSCII_C64_TABLE_PATH, "utf8"));
  const doc = parseCharsetTableJsonV1(parsed);
  const unshifted = [...doc.unshifted];
  const shifted = [...doc.shifted];
  unshifted[0xa0] = null;
  shifted[0xa0] = null;
  const table = parseCharsetTableJson({ ...doc, unshifted, shifted });

  it("decode to a private-use character carrying the byte", () => {
    expect(decodePetscii(fs([0x41, 0xa0]), { table })).toBe("A\ue0a0");
  });

  it("encode back from that private-use character", () => {
    expect(Array.from(encodePetsciiBytes("A\ue0a0", { table }))).toEqual([0x41, 0xa0]);
  });

  it("are not accepted for bytes that have a mapping", () => {
    expect(() => encodePetsciiBytes("\ue041", { table })).toThrow(UnmappableCharacterError);
    expect(() => encodePetsciiBytes("\ue0a0")).toThrow(UnmappableCharacterError);
  });
});

describe("bytes unmapped in one mode only", () => {
  const parsed: unknown = JSON.parse(readFileSync(PETSCII_C64_TABLE_PATH, "utf8"));
  const doc = parseCharsetTableJsonV1(parsed);
  const shifted = [...doc.shifted];
  shifted[0xa0] = null;
  const table = parseCharsetTableJson({ ...doc, shifted });

  it("decode to the private-use character only in that mode", () => {
    expect(decodePetscii(fs([0xa0]), { table })).toBe("\u00a0");
    expect(decodePetscii(fs([0x0e, 0xa0]), { table })).toBe("\ue0a0");
  });

  it("encode back by shifting into the mode where the byte is unmapped", () => {
    expect(Array.from(encodePetsciiBytes("\ue0a0", { table }))).toEqual([0x0e, 0xa0]);
    expect(Array.from(encodePetsciiBytes("A\ue0a0B", { table }))).toEqual([0x41, 0x0e, 0xa0, 0xc2]);
  });

  it("survive a decode/encode trip", () => {
    const bytes = [0x41, 0x0e, 0xa0, 0x49];
    const text = decodePetscii(fs(bytes), { table });
    expect(text).toBe("A\ue0a0i");
    expect(bytesOf(encodePetscii(text, 4, { table }))).toEqual(bytes);
  });
});
