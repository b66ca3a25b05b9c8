// src/petscii/petsciiC64.ts
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { parseCharsetTableJson, type CharsetTable } from "./charsetTable.js";

export const PETSCII_C64_TABLE_PATH = fileURLToPath(
  new URL("../../data/charsets/petscii-c64.json", import.meta.url),
);

function loadBuiltinTable(): CharsetTable {
  const parsed: unknown = JSON.parse(readFileSync(PETSCII_C64_TABLE_PATH, "utf8"));
  return parseCharsetTableJson(parsed);
}

/** Commodore 64 PETSCII. Loaded once when this module is first imported. */
export const PETSCII_C64: CharsetTable = loadBuiltinTable();

export const PETSCII_SPACE = 0x20;

/** Shift+Space. Commodore DOS pads directory names and headers with it. */
export const PETSCII_SHIFTED_SPACE = 0xa0;
