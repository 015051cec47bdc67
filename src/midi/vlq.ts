// ─── Variable-Length Quantities ──────────────────────────────────────────────
//
// Standard MIDI files store delta-times as big-endian base-128 integers.
// Every byte but the last carries the continuation bit (0x80):
//
//   0     → 00
//   127   → 7F
//   128   → 81 00
//   16384 → 81 80 00
// ─────────────────────────────────────────────────────────────────────────────

/** Largest value a MIDI VLQ may hold (four bytes, 28 bits). */
export const MAX_VAR_LENGTH = 0x0fffffff;

/**
 * Encode a non-negative integer as a minimal-length VLQ.
 */
export function encodeVarLength(value: number): number[] {
  if (!Number.isInteger(value) || value < 0 || value > MAX_VAR_LENGTH) {
    throw new RangeError(`VLQ value out of range: ${value} (expected 0–${MAX_VAR_LENGTH})`);
  }

  const bytes = [value & 0x7f];
  for (let rest = value >>> 7; rest > 0; rest >>>= 7) {
    bytes.unshift((rest & 0x7f) | 0x80);
  }
  return bytes;
}

/** Result of reading one VLQ out of a byte buffer. */
export interface DecodedVarLength {
  value: number;
  /** Number of bytes consumed. */
  length: number;
}

/**
 * Decode a VLQ starting at `offset`.
 *
 * Accumulates 7 bits per byte until the first byte with the high bit clear.
 */
export function decodeVarLength(bytes: ArrayLike<number>, offset: number = 0): DecodedVarLength {
  let value = 0;
  for (let i = offset; i < bytes.length; i++) {
    const byte = bytes[i];
    value = value * 128 + (byte & 0x7f);
    if ((byte & 0x80) === 0) {
      return { value, length: i - offset + 1 };
    }
  }
  throw new RangeError(`Truncated VLQ at offset ${offset}`);
}
