// ─── Morse Track Builder ─────────────────────────────────────────────────────
//
// Walks a Morse symbol stream and writes the MTrk payload:
//
//   00 FF 51 03 tt tt tt                     set tempo
//   <delta> 90 4C 64 <length> 80 4C 00       one note per dot / dash
//   ...
//   <delta> FF 2F 00                         end of track
//
// Delta-times are relative to the previous event. After a note the pending
// delta is one dot; a letter separator sets it to four dots, a word
// separator to seven.
// ─────────────────────────────────────────────────────────────────────────────

import { encodeVarLength } from "./vlq.js";
import { DOT, DASH, LETTER_SEPARATOR, WORD_SEPARATOR } from "../morse/alphabet.js";
import {
  TICKS_PER_BEAT,
  MIN_TICKS_PER_BEAT,
  MAX_TICKS_PER_BEAT,
  MAX_DATA_BYTE,
  MORSE_NOTE,
  MORSE_VELOCITY,
  MICROSECONDS_PER_MINUTE,
  MAX_MICROSECONDS_PER_BEAT,
  NOTE_ON,
  NOTE_OFF,
  META,
  META_SET_TEMPO,
  META_END_OF_TRACK,
  type TimingUnits,
  type MorseMidiOptions,
} from "./types.js";

/**
 * Derive the dot/dash/gap lengths for a timing resolution.
 *
 * At 96 ticks per beat: dot 48, dash 144, letterGap 192, pause 336.
 */
export function timingUnits(ticksPerBeat: number = TICKS_PER_BEAT): TimingUnits {
  assertTicksPerBeat(ticksPerBeat);
  const dot = Math.trunc(ticksPerBeat / 2);
  return {
    dot,
    dash: dot * 3,
    letterGap: dot * 4,
    pause: dot * 7,
  };
}

/** Throws unless the resolution fits the metrical header field (2–0x7FFF). */
export function assertTicksPerBeat(ticksPerBeat: number): void {
  if (
    !Number.isInteger(ticksPerBeat) ||
    ticksPerBeat < MIN_TICKS_PER_BEAT ||
    ticksPerBeat > MAX_TICKS_PER_BEAT
  ) {
    throw new RangeError(
      `Ticks per beat out of range: ${ticksPerBeat} (expected ${MIN_TICKS_PER_BEAT}–${MAX_TICKS_PER_BEAT})`
    );
  }
}

function assertDataByte(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_DATA_BYTE) {
    throw new RangeError(`${name} out of range: ${value} (expected 0–${MAX_DATA_BYTE})`);
  }
}

/**
 * Microseconds per quarter note for a BPM, truncated toward zero.
 *
 * 120 → 500000, 60 → 1000000, 7 → 8571428.
 * Throws when the result does not fit the 24-bit tempo field (bpm < 4).
 */
export function tempoMicroseconds(bpm: number): number {
  if (!Number.isInteger(bpm) || bpm <= 0) {
    throw new RangeError(`BPM must be a positive integer, got ${bpm}`);
  }
  const micros = Math.trunc(MICROSECONDS_PER_MINUTE / bpm);
  if (micros > MAX_MICROSECONDS_PER_BEAT) {
    throw new RangeError(
      `BPM ${bpm} is too slow: ${micros} µs per beat does not fit the 24-bit tempo field`
    );
  }
  return micros;
}

// ─── Track Writer ────────────────────────────────────────────────────────────

/**
 * Append-only byte buffer for one track. `finish()` hands out the bytes
 * once; nothing can be written afterwards.
 */
export class TrackWriter {
  private readonly bytes: number[] = [];
  private finished = false;

  get length(): number {
    return this.bytes.length;
  }

  writeBytes(...values: number[]): this {
    if (this.finished) {
      throw new Error("Track already finished");
    }
    const invalid = values.find((v) => !Number.isInteger(v) || v < 0 || v > 0xff);
    if (invalid !== undefined) {
      throw new RangeError(`Not a byte: ${invalid}`);
    }
    this.bytes.push(...values);
    return this;
  }

  writeVarLength(value: number): this {
    return this.writeBytes(...encodeVarLength(value));
  }

  /** Set-tempo meta event: FF 51 03 + 24-bit big-endian µs per beat. */
  tempoEvent(deltaTime: number, microsecondsPerBeat: number): this {
    return this.writeVarLength(deltaTime).writeBytes(
      META, META_SET_TEMPO, 0x03,
      (microsecondsPerBeat >> 16) & 0xff,
      (microsecondsPerBeat >> 8) & 0xff,
      microsecondsPerBeat & 0xff,
    );
  }

  /** Note-on after `deltaTime`, note-off `duration` ticks later. */
  noteEvent(deltaTime: number, note: number, velocity: number, duration: number): this {
    return this.writeVarLength(deltaTime)
      .writeBytes(NOTE_ON, note, velocity)
      .writeVarLength(duration)
      .writeBytes(NOTE_OFF, note, 0x00);
  }

  endOfTrack(deltaTime: number): this {
    return this.writeVarLength(deltaTime).writeBytes(META, META_END_OF_TRACK, 0x00);
  }

  finish(): Uint8Array {
    if (this.finished) {
      throw new Error("Track already finished");
    }
    this.finished = true;
    return Uint8Array.from(this.bytes);
  }
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Build the MTrk payload (without the chunk envelope) for a Morse stream.
 * Characters other than ".", "-", " " and "/" are ignored.
 */
export function buildMorseTrack(morse: string, options: MorseMidiOptions): Uint8Array {
  const units = timingUnits(options.ticksPerBeat ?? TICKS_PER_BEAT);
  const note = options.note ?? MORSE_NOTE;
  const velocity = options.velocity ?? MORSE_VELOCITY;
  assertDataByte("Note", note);
  assertDataByte("Velocity", velocity);

  const writer = new TrackWriter();
  writer.tempoEvent(0, tempoMicroseconds(options.bpm));

  let pending = 0;
  for (const symbol of morse) {
    switch (symbol) {
      case DOT:
        writer.noteEvent(pending, note, velocity, units.dot);
        pending = units.dot;
        break;
      case DASH:
        writer.noteEvent(pending, note, velocity, units.dash);
        pending = units.dot;
        break;
      case LETTER_SEPARATOR:
        pending = units.letterGap;
        break;
      case WORD_SEPARATOR:
        pending = units.pause;
        break;
    }
  }

  writer.endOfTrack(pending);
  return writer.finish();
}
