// ─── Errors ──────────────────────────────────────────────────────────────────
//
// InputError: nothing to convert, or invalid options. No file is written.
// PersistenceError: the finished MIDI buffer could not be written.
//
// Encoder range violations (bad BPM, VLQ out of range) are RangeErrors.
// ─────────────────────────────────────────────────────────────────────────────

export type MorseMidiErrorCode = "INPUT" | "PERSISTENCE";

export class MorseMidiError extends Error {
  readonly code: MorseMidiErrorCode;

  constructor(code: MorseMidiErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MorseMidiError";
    this.code = code;
  }
}

export class InputError extends MorseMidiError {
  constructor(message: string) {
    super("INPUT", message);
    this.name = "InputError";
  }
}

export class PersistenceError extends MorseMidiError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super("PERSISTENCE", cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = "PersistenceError";
    this.path = path;
  }
}
