// src/index.ts
export {
  CHARSET_SCHEMA_V1,
  isControlByte,
  isMappedByte,
  loadCharsetTableFile,
  lookupByte,
  lookupScalar,
  parseCharsetTableJson,
  parseCharsetTableJsonV1,
} from "./petscii/charsetTable.js";
export type {
  ByteMapping,
  ByteRange,
  CharsetTable,
  CharsetTableJsonV1,
  ScalarCandidate,
  WarnFn,
} from "./petscii/charsetTable.js";

export {
  PRIVATE_USE_BASE,
  decodePetscii,
  decodePetsciiBytes,
  encodePetscii,
  encodePetsciiBytes,
  tryEncodePetscii,
} from "./petscii/codec.js";
export type { DecodeOptions, EncodeOptions, LengthPolicy } from "./petscii/codec.js";

export { GLYPH_PLACEHOLDER, formatDebug, formatHexDump } from "./petscii/debugFormat.js";
export type { DebugFormatOptions, HexDumpOptions } from "./petscii/debugFormat.js";

export {
  InvalidByteError,
  InvalidCharsetTableError,
  LengthExceededError,
  LengthMismatchError,
  NotDisplayableError,
  PetsciiError,
  UnmappableCharacterError,
} from "./petscii/errors.js";
export type { PetsciiErrorKind, Result } from "./petscii/errors.js";

export { FixedString, tryFixedString } from "./petscii/fixedString.js";
export type { ByteSource, OverflowPolicy, PadOptions } from "./petscii/fixedString.js";

export { formatHexBytes, parseHexBytes } from "./petscii/hex.js";

export {
  PETSCII_C64,
  PETSCII_C64_TABLE_PATH,
  PETSCII_SHIFTED_SPACE,
  PETSCII_SPACE,
} from "./petscii/petsciiC64.js";

export {
  fixedStringToScreenCodes,
  petsciiToScreenCode,
  screenCodeToPetscii,
  screenCodesToFixedString,
} from "./petscii/screenCodes.js";
export type { ScreenCell } from "./petscii/screenCodes.js";

export { INITIAL_SHIFT_MODE, stepShift, transitionBytes } from "./petscii/shiftState.js";
export type { ShiftMode, ShiftStep } from "./petscii/shiftState.js";
