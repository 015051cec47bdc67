// ─── MIDI Types ─────────────────────────────────────────────────────────────
//
// Constants and shapes shared by the Morse track builder and the MIDI
// inspector. Timing inside the encoder is in ticks; the inspector also
// reports seconds.
// ─────────────────────────────────────────────────────────────────────────────

/** Timing resolution written into every Morse MIDI header. */
export const TICKS_PER_BEAT = 96;

/**
 * Bit 15 of the header division field switches to SMPTE timing, and a
 * resolution of 1 would make the dot zero ticks long.
 */
export const MIN_TICKS_PER_BEAT = 2;
export const MAX_TICKS_PER_BEAT = 0x7fff;

/** Largest value of a channel-message data byte (note, velocity). */
export const MAX_DATA_BYTE = 0x7f;

/** E5. Every dot and dash sounds this pitch. */
export const MORSE_NOTE = 76;

export const MORSE_VELOCITY = 100;

export const DEFAULT_BPM = 120;

export const MICROSECONDS_PER_MINUTE = 60_000_000;

/** The set-tempo meta event holds a 24-bit value. */
export const MAX_MICROSECONDS_PER_BEAT = 0xffffff;

/** Status and meta bytes used by the encoder. */
export const NOTE_ON = 0x90;
export const NOTE_OFF = 0x80;
export const META = 0xff;
export const META_SET_TEMPO = 0x51;
export const META_END_OF_TRACK = 0x2f;

/** Durations derived from ticks-per-beat, all in ticks. */
export interface TimingUnits {
  /** Length of a dot (half a beat). */
  dot: number;
  /** Length of a dash (3 × dot). */
  dash: number;
  /** Silence between letters (4 × dot). */
  letterGap: number;
  /** Silence between words (7 × dot). */
  pause: number;
}

/** Options for building a Morse MIDI track or file. */
export interface MorseMidiOptions {
  /** Tempo in beats per minute. Positive integer. */
  bpm: number;
  /** Defaults to {@link TICKS_PER_BEAT}. */
  ticksPerBeat?: number;
  /** Defaults to {@link MORSE_NOTE}. */
  note?: number;
  /** Defaults to {@link MORSE_VELOCITY}. */
  velocity?: number;
}

/** A single note event extracted from a MIDI file. */
export interface MidiNoteEvent {
  /** MIDI note number (0–127). */
  note: number;
  /** Velocity of the note-on (1–127). */
  velocity: number;
  /** Absolute start in ticks. */
  startTick: number;
  /** Length in ticks (note-on to note-off). */
  durationTicks: number;
  /** Absolute start in seconds, at the initial tempo. */
  time: number;
  /** Length in seconds, at the initial tempo. */
  duration: number;
  /** MIDI channel (0–15). */
  channel: number;
}

/** A tempo change event from the MIDI file. */
export interface TempoEvent {
  /** Absolute tick where this tempo takes effect. */
  tick: number;
  bpm: number;
  microsecondsPerBeat: number;
}

/** Summary of a parsed standard MIDI file. */
export interface ParsedMidi {
  /** 0 = single track, 1 = multi-track, 2 = multi-song. */
  format: number;
  trackCount: number;
  ticksPerBeat: number;
  /** Initial BPM (from the first tempo event, or 120 if none). */
  bpm: number;
  /** Raw tempo of the first tempo event (500000 if none). */
  microsecondsPerBeat: number;
  /** Every set-tempo event, in tick order. Only the first affects seconds. */
  tempoChanges: TempoEvent[];
  /** All note events, sorted by start. */
  events: MidiNoteEvent[];
  noteCount: number;
  /** Tick of the last event in the longest track (end-of-track included). */
  durationTicks: number;
  /** `durationTicks` at the initial tempo. */
  durationSeconds: number;
}
