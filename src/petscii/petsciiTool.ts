// src/petscii/petsciiTool.ts
import { readFile, writeFile } from "node:fs/promises";

import { loadCharsetTableFile, type CharsetTable } from "./charsetTable.js";
import { decodePetscii, encodePetscii, encodePetsciiBytes, type LengthPolicy } from "./codec.js";
import { formatHexDump } from "./debugFormat.js";
import { LengthMismatchError } from "./errors.js";
import { FixedString } from "./fixedString.js";
import { formatHexBytes, parseHexBytes } from "./hex.js";
import { PETSCII_C64, PETSCII_SHIFTED_SPACE, PETSCII_SPACE } from "./petsciiC64.js";
import { fixedStringToScreenCodes, screenCodesToFixedString } from "./screenCodes.js";

export type InputOptions = Readonly<{
  hex?: string; // bytes given on the command line instead of a file
  table?: string; // path to a charset table JSON
}>;

export type DecodeToolOptions = InputOptions &
  Readonly<{
    recordLength?: string;
    stripPadding?: string | boolean;
  }>;

export type EncodeToolOptions = Readonly<{
  text?: string;
  table?: string;
  length?: string;
  policy?: string;
  fill?: string;
  output?: string;
  hex?: boolean;
}>;

export type DumpToolOptions = InputOptions & Readonly<{ width?: string }>;

export type ScreenToolOptions = Readonly<{
  hex?: string;
  toPetscii?: boolean;
  reverse?: boolean;
}>;

/** Accepts decimal ("160") or hex ("0xa0", "$a0"). */
export function parseByteOption(value: string, name: string): number {
  const s = value.trim().toLowerCase();
  let n: number;
  if (s.startsWith("0x")) n = Number.parseInt(s.slice(2), 16);
  else if (s.startsWith("$")) n = Number.parseInt(s.slice(1), 16);
  else if (/^\d+$/.test(s)) n = Number.parseInt(s, 10);
  else n = Number.NaN;

  if (!Number.isInteger(n) || n < 0 || n > 0xff) {
    throw new Error(`Invalid --${name} '${value}': expected a byte (e.g. 32, 0x20, $20)`);
  }
  return n;
}

export function parseCountOption(value: string, name: string): number {
  const s = value.trim();
  const n = /^\d+$/.test(s) ? Number.parseInt(s, 10) : Number.NaN;
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`Invalid --${name} '${value}': expected a positive integer`);
  }
  return n;
}

export function parseLengthPolicy(value: string): LengthPolicy {
  const s = value.trim().toLowerCase();
  if (s === "fail" || s === "error" || s === "strict") return "fail";
  if (s === "pad" || s === "fill") return "pad";
  if (s === "truncate" || s === "trunc" || s === "cut") return "truncate";
  throw new Error(`Unknown length policy '${value}'. Expected: fail|pad|truncate`);
}

async function readStdin(): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

async function readInputBytes(input: string | undefined, hex: string | undefined): Promise<Uint8Array> {
  if (hex !== undefined) return parseHexBytes(hex);
  if (input !== undefined && input !== "-") return readFile(input);
  return readStdin();
}

async function resolveTable(tablePath: string | undefined): Promise<CharsetTable> {
  if (tablePath === undefined) return PETSCII_C64;
  return loadCharsetTableFile(tablePath, (m) => console.warn(`${tablePath}: ${m}`));
}

/** Splits `bytes` into records of `recordLength` (default: one record of the whole input). */
export function splitRecords(bytes: Uint8Array, recordLength?: number): FixedString[] {
  const n = recordLength ?? bytes.length;
  if (n === 0) return [FixedString.fromBytes(0, bytes)];

  const out: FixedString[] = [];
  for (let offset = 0; offset < bytes.length; offset += n) {
    const chunk = bytes.subarray(offset, offset + n);
    if (chunk.length !== n) throw new LengthMismatchError(n, chunk.length);
    out.push(FixedString.fromBytes(n, chunk));
  }
  return out;
}

export function decodeRecords(
  bytes: Uint8Array,
  params: Readonly<{ recordLength?: number; stripTrailing?: number; table?: CharsetTable }>,
): string[] {
  const table = params.table ?? PETSCII_C64;
  return splitRecords(bytes, params.recordLength).map((r) =>
    decodePetscii(
      r,
      params.stripTrailing !== undefined ? { table, stripTrailing: params.stripTrailing } : { table },
    ),
  );
}

export async function runDecodeTool(input: string | undefined, opts: DecodeToolOptions): Promise<string[]> {
  const table = await resolveTable(opts.table);
  const bytes = await readInputBytes(input, opts.hex);

  const params: { recordLength?: number; stripTrailing?: number; table: CharsetTable } = { table };
  if (opts.recordLength !== undefined) params.recordLength = parseCountOption(opts.recordLength, "record-length");
  if (opts.stripPadding === true) params.stripTrailing = PETSCII_SHIFTED_SPACE;
  else if (typeof opts.stripPadding === "string") {
    params.stripTrailing = parseByteOption(opts.stripPadding, "strip-padding");
  }

  const lines = decodeRecords(bytes, params);
  for (const line of lines) process.stdout.write(line + "\n");
  return lines;
}

/** Drops one trailing line break, as left by `echo` or an editor. */
export function stripFinalNewline(text: string): string {
  if (text.endsWith("\r\n")) return text.slice(0, -2);
  if (text.endsWith("\n")) return text.slice(0, -1);
  return text;
}

export function encodeText(
  text: string,
  params: Readonly<{ length?: number; policy?: LengthPolicy; fill?: number; table?: CharsetTable }>,
): FixedString {
  const table = params.table ?? PETSCII_C64;
  const length = params.length ?? encodePetsciiBytes(text, { table }).length;
  return encodePetscii(text, length, {
    table,
    policy: params.policy ?? "fail",
    fill: params.fill ?? PETSCII_SPACE,
  });
}

export async function runEncodeTool(input: string | undefined, opts: EncodeToolOptions): Promise<FixedString> {
  const table = await resolveTable(opts.table);

  let text: string;
  if (opts.text !== undefined) text = opts.text;
  else if (input !== undefined && input !== "-") text = stripFinalNewline(await readFile(input, "utf8"));
  else text = stripFinalNewline((await readStdin()).toString("utf8"));

  const params: { length?: number; policy?: LengthPolicy; fill?: number; table: CharsetTable } = { table };
  if (opts.length !== undefined) params.length = parseCountOption(opts.length, "length");
  if (opts.policy !== undefined) params.policy = parseLengthPolicy(opts.policy);
  if (opts.fill !== undefined) params.fill = parseByteOption(opts.fill, "fill");

  const str = encodeText(text, params);

  if (opts.output !== undefined) {
    await writeFile(opts.output, str.toBytes());
    console.log(`${str.length} bytes -> ${opts.output}`);
  } else if (opts.hex === true) {
    process.stdout.write(formatHexBytes(str) + "\n");
  } else {
    process.stdout.write(str.toBytes());
  }
  return str;
}

export async function runDumpTool(input: string | undefined, opts: DumpToolOptions): Promise<string> {
  const table = await resolveTable(opts.table);
  const bytes = await readInputBytes(input, opts.hex);
  const width = opts.width !== undefined ? parseCountOption(opts.width, "width") : 16;

  const dump = formatHexDump(FixedString.fromBytes(bytes.length, bytes), { table, width });
  if (dump.length > 0) process.stdout.write(dump + "\n");
  return dump;
}

export async function runScreenTool(input: string | undefined, opts: ScreenToolOptions): Promise<string> {
  const bytes = await readInputBytes(input, opts.hex);
  const str = FixedString.fromBytes(bytes.length, bytes);

  const out = opts.toPetscii === true
    ? screenCodesToFixedString(str)
    : fixedStringToScreenCodes(str, { reverse: opts.reverse === true });

  const text = formatHexBytes(out);
  process.stdout.write(text + "\n");
  return text;
}
