#!/usr/bin/env node
// src/cli.ts
import { Command } from "commander";

import {
  runDecodeTool,
  runDumpTool,
  runEncodeTool,
  runScreenTool,
} from "./petscii/petsciiTool.js";

const program = new Command();

program
  .name("petsciitools")
  .description("PETSCII tools (fixed-length PETSCII <-> Unicode, dumps, screen codes)")
  .version("0.1.0");

program
  .command("decode")
  .description("Decode PETSCII bytes to Unicode text")
  .argument("[input]", "Path to a file of PETSCII bytes (default: stdin)")
  .option("--hex <bytes>", "Read bytes from the command line, e.g. '0e 48 49'")
  .option("--record-length <n>", "Split the input into fixed-length records, one line each")
  .option("--strip-padding [byte]", "Ignore trailing padding bytes (default byte: 0xa0)")
  .option("--table <path>", "Charset table JSON (default: built-in C64 PETSCII)")
  .action(
    async (
      input: string | undefined,
      opts: { hex?: string; recordLength?: string; stripPadding?: string | boolean; table?: string },
    ) => {
      await runDecodeTool(input, opts);
    },
  );

program
  .command("encode")
  .description("Encode Unicode text to a fixed-length PETSCII record")
  .argument("[input]", "Path to a UTF-8 text file (default: stdin)")
  .option("--text <text>", "Text to encode instead of reading a file")
  .option("-n, --length <n>", "Record length in bytes (default: the encoded length)")
  .option("--policy <policy>", "fail|pad|truncate when the text does not fill the record", "fail")
  .option("--fill <byte>", "Padding byte for pad/truncate", "0x20")
  .option("--table <path>", "Charset table JSON (default: built-in C64 PETSCII)")
  .option("-o, --output <path>", "Write raw bytes to a file (default: stdout)")
  .option("--hex", "Print bytes as hex instead of raw", false)
  .action(
    async (
      input: string | undefined,
      opts: {
        text?: string;
        length?: string;
        policy: string;
        fill: string;
        table?: string;
        output?: string;
        hex: boolean;
      },
    ) => {
      await runEncodeTool(input, opts);
    },
  );

program
  .command("dump")
  .description("Hex dump PETSCII bytes with unshifted glyphs")
  .argument("[input]", "Path to a file of PETSCII bytes (default: stdin)")
  .option("--hex <bytes>", "Read bytes from the command line")
  .option("--width <n>", "Bytes per row", "16")
  .option("--table <path>", "Charset table JSON (default: built-in C64 PETSCII)")
  .action(async (input: string | undefined, opts: { hex?: string; width: string; table?: string }) => {
    await runDumpTool(input, opts);
  });

program
  .command("screen")
  .description("Convert PETSCII bytes to screen codes (or back with --to-petscii)")
  .argument("[input]", "Path to a file of bytes (default: stdin)")
  .option("--hex <bytes>", "Read bytes from the command line")
  .option("--to-petscii", "Input is screen codes; print PETSCII", false)
  .option("--reverse", "Set the reverse-video bit on every screen code", false)
  .action(
    async (
      input: string | undefined,
      opts: { hex?: string; toPetscii: boolean; reverse: boolean },
    ) => {
      await runScreenTool(input, opts);
    },
  );

program.parseAsync(process.argv).catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(msg + "\n");
  process.exitCode = 1;
});
