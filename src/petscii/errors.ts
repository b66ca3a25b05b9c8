// src/petscii/errors.ts

export type PetsciiErrorKind =
  | "LengthMismatch"
  | "UnmappableCharacter"
  | "LengthExceeded"
  | "InvalidByte"
  | "NotDisplayable"
  | "InvalidCharsetTable";

export function formatScalar(scalar: number): string {
  return `U+${scalar.toString(16).toUpperCase().padStart(4, "0")}`;
}

export function formatByte(byte: number): string {
  return `0x${byte.toString(16).toUpperCase().padStart(2, "0")}`;
}

export abstract class PetsciiError extends Error {
  public abstract readonly kind: PetsciiErrorKind;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class LengthMismatchError extends PetsciiError {
  public readonly kind = "LengthMismatch" as const;

  public constructor(
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(`Length mismatch: expected ${expected} bytes, got ${actual}`);
  }
}

export class UnmappableCharacterError extends PetsciiError {
  public readonly kind = "UnmappableCharacter" as const;

  public constructor(
    public readonly scalar: number,
    public readonly index: number,
  ) {
    super(`Cannot encode character ${formatScalar(scalar)} at index ${index} in PETSCII`);
  }
}

export class LengthExceededError extends PetsciiError {
  public readonly kind = "LengthExceeded" as const;

  public constructor(
    public readonly needed: number,
    public readonly available: number,
  ) {
    super(`Encoded text needs ${needed} bytes but only ${available} are available`);
  }
}

export class InvalidByteError extends PetsciiError {
  public readonly kind = "InvalidByte" as const;

  public constructor(public readonly value: unknown) {
    super(`Invalid byte value: ${String(value)} (expected integer in [0, 255])`);
  }
}

export class NotDisplayableError extends PetsciiError {
  public readonly kind = "NotDisplayable" as const;

  public constructor(public readonly byte: number) {
    super(`PETSCII ${formatByte(byte)} is a control code and has no screen code`);
  }
}

export class InvalidCharsetTableError extends PetsciiError {
  public readonly kind = "InvalidCharsetTable" as const;

  public constructor(message: string) {
    super(`Invalid charset table: ${message}`);
  }
}

export type Result<T, E = PetsciiError> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; error: E }>;

/** Runs `fn`, turning a thrown PetsciiError into a failed Result. Other errors propagate. */
export function captureResult<T>(fn: () => T): Result<T> {
  try {
    return { ok: true, value: fn() };
  } catch (e: unknown) {
    if (e instanceof PetsciiError) return { ok: false, error: e };
    throw e;
  }
}
