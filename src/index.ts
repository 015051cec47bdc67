// ─── morse-midi ──────────────────────────────────────────────────────────────
//
// Text → Morse code → standard MIDI file.
//
// Usage:
//   import { textToMorse, createMorseMidi } from "morse-midi";
//   const bytes = createMorseMidi(textToMorse("sos"), { bpm: 120 });
// ─────────────────────────────────────────────────────────────────────────────

// Symbol mapper
export { textToMorse, isMorseSymbol, countMorseNotes } from "./morse/mapper.js";
export {
  MORSE_ALPHABET,
  MORSE_SYMBOLS,
  DOT,
  DASH,
  LETTER_SEPARATOR,
  WORD_SEPARATOR,
} from "./morse/alphabet.js";
export type { MorseSymbol } from "./morse/alphabet.js";

// Encoder
export { encodeVarLength, decodeVarLength, MAX_VAR_LENGTH } from "./midi/vlq.js";
export type { DecodedVarLength } from "./midi/vlq.js";
export {
  buildMorseTrack,
  timingUnits,
  tempoMicroseconds,
  assertTicksPerBeat,
  TrackWriter,
} from "./midi/track-builder.js";
export { headerChunk, trackChunk, createMorseMidi } from "./midi/chunks.js";
export {
  TICKS_PER_BEAT,
  MORSE_NOTE,
  MORSE_VELOCITY,
  DEFAULT_BPM,
  MICROSECONDS_PER_MINUTE,
  MAX_MICROSECONDS_PER_BEAT,
  MIN_TICKS_PER_BEAT,
  MAX_TICKS_PER_BEAT,
  MAX_DATA_BYTE,
} from "./midi/types.js";
export type {
  TimingUnits,
  MorseMidiOptions,
  MidiNoteEvent,
  TempoEvent,
  ParsedMidi,
} from "./midi/types.js";

// Inspector
export { parseMidiBuffer, parseMidiFile } from "./midi/parser.js";

// Pipeline
export { convertText, saveConversion, writeMorseMidi, outputFileName } from "./convert.js";
export type { Conversion, WrittenConversion } from "./convert.js";
export {
  ConversionOptionsSchema,
  validateOptions,
  parseOptions,
  MIN_BPM,
  MAX_BPM,
} from "./config/schema.js";
export type { ConversionOptions, ConversionInput, ConfigError } from "./config/schema.js";
export { parseCliArgs } from "./cli-args.js";
export type { CliCommand } from "./cli-args.js";

// Errors
export { MorseMidiError, InputError, PersistenceError } from "./errors.js";
export type { MorseMidiErrorCode } from "./errors.js";
