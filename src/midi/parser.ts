// ─── MIDI Inspector ──────────────────────────────────────────────────────────
//
// Reads a standard MIDI file with midi-file and summarises it. A Morse file
// carries one tempo at tick 0, so seconds are derived from the first
// set-tempo event only; later tempo events are listed but do not bend time.
// ─────────────────────────────────────────────────────────────────────────────

import { readFileSync } from "node:fs";
import { parseMidi, type MidiData } from "midi-file";
import type { ParsedMidi, TempoEvent } from "./types.js";

const DEFAULT_MICROSECONDS_PER_BEAT = 500_000;
const FALLBACK_TICKS_PER_BEAT = 480;

type MidiTrack = MidiData["tracks"][number];

/** A note as it is read, before the tempo is known. */
interface TickNote {
  note: number;
  velocity: number;
  channel: number;
  startTick: number;
  durationTicks: number;
}

/** What one pass over a track yields. */
interface TrackScan {
  notes: TickNote[];
  tempos: TempoEvent[];
  /** Absolute tick of the track's last event. */
  endTick: number;
}

/**
 * Parse a MIDI buffer into a summary.
 */
export function parseMidiBuffer(buffer: Uint8Array): ParsedMidi {
  const midi = parseMidi(buffer);
  const ticksPerBeat = midi.header.ticksPerBeat ?? FALLBACK_TICKS_PER_BEAT;

  const scans = midi.tracks.map(scanTrack);
  const tempoChanges = scans.flatMap((s) => s.tempos).sort((a, b) => a.tick - b.tick);
  const microsecondsPerBeat = tempoChanges[0]?.microsecondsPerBeat ?? DEFAULT_MICROSECONDS_PER_BEAT;

  const toSeconds = (ticks: number): number =>
    (ticks * microsecondsPerBeat) / ticksPerBeat / 1_000_000;

  const events = scans
    .flatMap((s) => s.notes)
    .sort((a, b) => a.startTick - b.startTick)
    .map((n) => ({
      ...n,
      time: toSeconds(n.startTick),
      duration: toSeconds(n.durationTicks),
    }));

  const durationTicks = Math.max(0, ...scans.map((s) => s.endTick));

  return {
    format: midi.header.format,
    trackCount: midi.tracks.length,
    ticksPerBeat,
    bpm: bpmOf(microsecondsPerBeat),
    microsecondsPerBeat,
    tempoChanges,
    events,
    noteCount: events.length,
    durationTicks,
    durationSeconds: toSeconds(durationTicks),
  };
}

/**
 * Read and parse a MIDI file from disk.
 */
export function parseMidiFile(path: string): ParsedMidi {
  return parseMidiBuffer(new Uint8Array(readFileSync(path)));
}

// ─── Internal ────────────────────────────────────────────────────────────────

function bpmOf(microsecondsPerBeat: number): number {
  return Math.round(60_000_000 / microsecondsPerBeat);
}

/**
 * Walk a track once, pairing note-ons with note-offs and collecting tempo
 * events. A note-on with velocity 0 ends a note.
 */
function scanTrack(track: MidiTrack): TrackScan {
  const notes: TickNote[] = [];
  const tempos: TempoEvent[] = [];
  // indexed by channel * 128 + note number
  const sounding = new Map<number, { startTick: number; velocity: number }>();
  let tick = 0;

  const release = (channel: number, note: number): void => {
    const slot = channel * 128 + note;
    const start = sounding.get(slot);
    if (start === undefined) return;
    sounding.delete(slot);
    notes.push({
      note,
      channel,
      velocity: start.velocity,
      startTick: start.startTick,
      durationTicks: tick - start.startTick,
    });
  };

  for (const event of track) {
    tick += event.deltaTime;
    switch (event.type) {
      case "setTempo":
        tempos.push({
          tick,
          microsecondsPerBeat: event.microsecondsPerBeat,
          bpm: bpmOf(event.microsecondsPerBeat),
        });
        break;
      case "noteOn":
        if (event.velocity === 0) {
          release(event.channel, event.noteNumber);
        } else {
          sounding.set(event.channel * 128 + event.noteNumber, { startTick: tick, velocity: event.velocity });
        }
        break;
      case "noteOff":
        release(event.channel, event.noteNumber);
        break;
    }
  }

  return { notes, tempos, endTick: tick };
}
