// ─── SMF Chunk Assembly ──────────────────────────────────────────────────────
//
// Wraps a track payload in the MThd / MTrk envelopes. Lengths and header
// fields are big-endian.
// ─────────────────────────────────────────────────────────────────────────────

import { assertTicksPerBeat, buildMorseTrack } from "./track-builder.js";
import { TICKS_PER_BEAT, type MorseMidiOptions } from "./types.js";

const HEADER_LENGTH = 6;
const HEADER_SIZE = 14;

/** Format 0, one track. */
export function headerChunk(ticksPerBeat: number = TICKS_PER_BEAT): Uint8Array {
  assertTicksPerBeat(ticksPerBeat);
  const chunk = new Uint8Array(HEADER_SIZE);
  const view = new DataView(chunk.buffer);
  chunk.set(asciiBytes("MThd"), 0);
  view.setUint32(4, HEADER_LENGTH);
  view.setUint16(8, 0);
  view.setUint16(10, 1);
  view.setUint16(12, ticksPerBeat);
  return chunk;
}

/** "MTrk" + 32-bit length + payload. */
export function trackChunk(track: Uint8Array): Uint8Array {
  const chunk = new Uint8Array(8 + track.length);
  chunk.set(asciiBytes("MTrk"), 0);
  new DataView(chunk.buffer).setUint32(4, track.length);
  chunk.set(track, 8);
  return chunk;
}

/**
 * Encode a Morse stream as a complete single-track MIDI file.
 */
export function createMorseMidi(morse: string, options: MorseMidiOptions): Uint8Array {
  const ticksPerBeat = options.ticksPerBeat ?? TICKS_PER_BEAT;
  const header = headerChunk(ticksPerBeat);
  const track = trackChunk(buildMorseTrack(morse, { ...options, ticksPerBeat }));

  const file = new Uint8Array(header.length + track.length);
  file.set(header, 0);
  file.set(track, header.length);
  return file;
}

function asciiBytes(tag: string): number[] {
  return Array.from(tag, (c) => c.charCodeAt(0));
}
