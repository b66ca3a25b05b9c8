// src/petscii/charsetTable.ts
//
// Charset tables are JSON documents (schema "petsciitools.charset.v1"):
// - two 256-entry arrays, one per shift mode; each entry is a one-scalar string or null
// - controlRanges: inclusive byte ranges that are control codes in both modes
// - aliasRanges: inclusive byte ranges that repeat glyphs found elsewhere; the
//   encoder only picks an alias byte when no other byte decodes to the scalar
//
// The reverse index is built once when a table is parsed and frozen with it.

import { readFile } from "node:fs/promises";

import { InvalidByteError, InvalidCharsetTableError, formatByte, formatScalar } from "./errors.js";
import type { ShiftMode } from "./shiftState.js";

export type WarnFn = (msg: string) => void;

export const CHARSET_SCHEMA_V1 = "petsciitools.charset.v1";

export type ByteRange = readonly [number, number];

export type CharsetTableJsonV1 = {
  schema: typeof CHARSET_SCHEMA_V1;
  name: string;
  description?: string;
  shiftOut: number;
  shiftIn: number;
  controlRanges: ByteRange[];
  aliasRanges?: ByteRange[];
  unshifted: Array<string | null>;
  shifted: Array<string | null>;
};

export type ByteMapping =
  | Readonly<{ kind: "printable"; scalar: number; char: string }>
  | Readonly<{ kind: "control" }>
  | Readonly<{ kind: "unmapped" }>;

export type ScalarCandidate = Readonly<{ byte: number; mode: ShiftMode }>;

export type CharsetTable = Readonly<{
  name: string;
  description?: string;
  shiftOut: number;
  shiftIn: number;
  unshifted: ReadonlyArray<ByteMapping>;
  shifted: ReadonlyArray<ByteMapping>;
  aliases: ReadonlySet<number>;
  reverse: ReadonlyMap<number, ReadonlyArray<ScalarCandidate>>;
}>;

const CONTROL: ByteMapping = { kind: "control" };
const UNMAPPED: ByteMapping = { kind: "unmapped" };
const NO_CANDIDATES: ReadonlyArray<ScalarCandidate> = Object.freeze([]);

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function isByte(v: unknown): v is number {
  return typeof v === "number" && Number.isInteger(v) && v >= 0 && v <= 0xff;
}

function parseByteField(input: Record<string, unknown>, key: string): number {
  const v = input[key];
  if (!isByte(v)) throw new InvalidCharsetTableError(`${key}: expected integer in [0, 255]`);
  return v;
}

function parseRanges(v: unknown, name: string): ByteRange[] {
  if (!Array.isArray(v)) throw new InvalidCharsetTableError(`${name}: expected array`);
  return v.map((r: unknown, i): ByteRange => {
    if (!Array.isArray(r) || r.length !== 2) {
      throw new InvalidCharsetTableError(`${name}[${i}]: expected [first, last]`);
    }
    const first: unknown = r[0];
    const last: unknown = r[1];
    if (!isByte(first) || !isByte(last) || first > last) {
      throw new InvalidCharsetTableError(`${name}[${i}]: expected bytes with first <= last`);
    }
    return [first, last];
  });
}

function parseModeEntries(v: unknown, name: string): Array<string | null> {
  if (!Array.isArray(v) || v.length !== 256) {
    throw new InvalidCharsetTableError(`${name}: expected array of 256 entries`);
  }
  return v.map((e: unknown, i): string | null => {
    if (e === null) return null;
    if (typeof e !== "string" || Array.from(e).length !== 1) {
      throw new InvalidCharsetTableError(
        `${name}[${formatByte(i)}]: expected a single character or null`,
      );
    }
    return e;
  });
}

export function parseCharsetTableJsonV1(input: unknown): CharsetTableJsonV1 {
  if (!isRecord(input)) throw new InvalidCharsetTableError("expected object");
  if (input.schema !== CHARSET_SCHEMA_V1) {
    throw new InvalidCharsetTableError(`schema: expected "${CHARSET_SCHEMA_V1}"`);
  }
  if (typeof input.name !== "string" || input.name.length === 0) {
    throw new InvalidCharsetTableError("name: expected non-empty string");
  }

  const out: CharsetTableJsonV1 = {
    schema: CHARSET_SCHEMA_V1,
    name: input.name,
    shiftOut: parseByteField(input, "shiftOut"),
    shiftIn: parseByteField(input, "shiftIn"),
    controlRanges: parseRanges(input.controlRanges, "controlRanges"),
    unshifted: parseModeEntries(input.unshifted, "unshifted"),
    shifted: parseModeEntries(input.shifted, "shifted"),
  };

  if (input.description !== undefined) {
    if (typeof input.description !== "string") {
      throw new InvalidCharsetTableError("description: expected string");
    }
    out.description = input.description;
  }
  if (input.aliasRanges !== undefined) {
    out.aliasRanges = parseRanges(input.aliasRanges, "aliasRanges");
  }

  return out;
}

function inRanges(byte: number, ranges: ReadonlyArray<ByteRange>): boolean {
  return ranges.some(([first, last]) => byte >= first && byte <= last);
}

function buildModeMappings(
  entries: ReadonlyArray<string | null>,
  controlRanges: ReadonlyArray<ByteRange>,
  name: string,
): ReadonlyArray<ByteMapping> {
  const out = entries.map((e, byte): ByteMapping => {
    if (inRanges(byte, controlRanges)) {
      if (e !== null) {
        throw new InvalidCharsetTableError(
          `${name}[${formatByte(byte)}]: control byte must be null`,
        );
      }
      return CONTROL;
    }
    if (e === null) return UNMAPPED;
    const printable: ByteMapping = { kind: "printable", scalar: e.codePointAt(0) ?? 0, char: e };
    return Object.freeze(printable);
  });
  return Object.freeze(out);
}

function byteScanOrder(aliases: ReadonlySet<number>): number[] {
  const primary: number[] = [];
  const alias: number[] = [];
  for (let b = 0; b <= 0xff; b++) (aliases.has(b) ? alias : primary).push(b);
  return [...primary, ...alias];
}

function buildReverse(
  modes: ReadonlyArray<readonly [ShiftMode, ReadonlyArray<ByteMapping>]>,
  aliases: ReadonlySet<number>,
  warn: WarnFn | undefined,
): ReadonlyMap<number, ReadonlyArray<ScalarCandidate>> {
  const reverse = new Map<number, ScalarCandidate[]>();
  const order = byteScanOrder(aliases);

  for (const [mode, mappings] of modes) {
    const firstPrimary = new Map<number, number>();
    for (const byte of order) {
      const m = mappings[byte];
      if (m === undefined || m.kind !== "printable") continue;

      if (!aliases.has(byte)) {
        const seen = firstPrimary.get(m.scalar);
        if (seen !== undefined) {
          warn?.(
            `${mode}: ${formatScalar(m.scalar)} is mapped from both ${formatByte(seen)} and ` +
              `${formatByte(byte)}; encoding uses ${formatByte(seen)}`,
          );
        } else {
          firstPrimary.set(m.scalar, byte);
        }
      }

      const list = reverse.get(m.scalar);
      if (list) list.push(Object.freeze({ byte, mode }));
      else reverse.set(m.scalar, [Object.freeze({ byte, mode })]);
    }
  }

  for (const list of reverse.values()) Object.freeze(list);
  return reverse;
}

/** Validates a parsed JSON document and builds the frozen lookup table. */
export function parseCharsetTableJson(input: unknown, warn?: WarnFn): CharsetTable {
  const doc = parseCharsetTableJsonV1(input);

  if (doc.shiftOut === doc.shiftIn) {
    throw new InvalidCharsetTableError("shiftOut and shiftIn must differ");
  }
  for (const key of ["shiftOut", "shiftIn"] as const) {
    if (!inRanges(doc[key], doc.controlRanges)) {
      throw new InvalidCharsetTableError(`${key}: ${formatByte(doc[key])} is not a control byte`);
    }
  }

  const aliases = new Set<number>();
  for (const [first, last] of doc.aliasRanges ?? []) {
    for (let b = first; b <= last; b++) aliases.add(b);
  }

  const unshifted = buildModeMappings(doc.unshifted, doc.controlRanges, "unshifted");
  const shifted = buildModeMappings(doc.shifted, doc.controlRanges, "shifted");
  const reverse = buildReverse(
    [
      ["UNSHIFTED", unshifted],
      ["SHIFTED", shifted],
    ],
    aliases,
    warn,
  );

  const table: CharsetTable = {
    name: doc.name,
    shiftOut: doc.shiftOut,
    shiftIn: doc.shiftIn,
    unshifted,
    shifted,
    aliases,
    reverse,
    ...(doc.description !== undefined ? { description: doc.description } : {}),
  };
  return Object.freeze(table);
}

export async function loadCharsetTableFile(filePath: string, warn?: WarnFn): Promise<CharsetTable> {
  const text = await readFile(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new InvalidCharsetTableError(`${filePath}: ${msg}`);
  }
  return parseCharsetTableJson(parsed, warn);
}

export function lookupByte(table: CharsetTable, mode: ShiftMode, byte: number): ByteMapping {
  const m = (mode === "SHIFTED" ? table.shifted : table.unshifted)[byte];
  if (m === undefined) throw new InvalidByteError(byte);
  return m;
}

/** Every (byte, mode) pair that decodes to `scalar`, most preferred first. */
export function lookupScalar(table: CharsetTable, scalar: number): ReadonlyArray<ScalarCandidate> {
  return table.reverse.get(scalar) ?? NO_CANDIDATES;
}

export function isControlByte(table: CharsetTable, byte: number): boolean {
  return lookupByte(table, "UNSHIFTED", byte).kind === "control";
}

/** True when `byte` decodes to a character in either mode. */
export function isMappedByte(table: CharsetTable, byte: number): boolean {
  return (
    lookupByte(table, "UNSHIFTED", byte).kind === "printable" ||
    lookupByte(table, "SHIFTED", byte).kind === "printable"
  );
}
