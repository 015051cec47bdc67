import { describe, it, expect } from "vitest";
import { writeMidi, type MidiData } from "midi-file";
import { parseMidiBuffer } from "./parser.js";

function buildMidi(data: MidiData): Uint8Array {
  return new Uint8Array(writeMidi(data));
}

describe("parseMidiBuffer", () => {
  it("treats note-on with velocity 0 as note-off", () => {
    const buffer = buildMidi({
      header: { format: 0, numTracks: 1, ticksPerBeat: 480 },
      tracks: [[
        { deltaTime: 0, meta: true, type: "setTempo", microsecondsPerBeat: 1_000_000 },
        { deltaTime: 0, type: "noteOn", channel: 2, noteNumber: 60, velocity: 80 },
        { deltaTime: 240, type: "noteOn", channel: 2, noteNumber: 60, velocity: 0 },
        { deltaTime: 0, meta: true, type: "endOfTrack" },
      ]],
    });

    const parsed = parseMidiBuffer(buffer);
    expect(parsed.bpm).toBe(60);
    expect(parsed.noteCount).toBe(1);
    expect(parsed.events[0]).toEqual({
      note: 60,
      velocity: 80,
      channel: 2,
      startTick: 0,
      durationTicks: 240,
      time: 0,
      duration: 0.5,
    });
  });

  it("defaults to 120 BPM without a tempo event", () => {
    const buffer = buildMidi({
      header: { format: 0, numTracks: 1, ticksPerBeat: 96 },
      tracks: [[{ deltaTime: 96, meta: true, type: "endOfTrack" }]],
    });

    const parsed = parseMidiBuffer(buffer);
    expect(parsed.bpm).toBe(120);
    expect(parsed.tempoChanges).toEqual([]);
    expect(parsed.durationSeconds).toBe(0.5);
  });

  it("lists later tempo events but times everything from the first", () => {
    const buffer = buildMidi({
      header: { format: 0, numTracks: 1, ticksPerBeat: 96 },
      tracks: [[
        { deltaTime: 0, meta: true, type: "setTempo", microsecondsPerBeat: 500_000 },
        { deltaTime: 0, type: "noteOn", channel: 0, noteNumber: 76, velocity: 100 },
        { deltaTime: 96, type: "noteOff", channel: 0, noteNumber: 76, velocity: 0 },
        { deltaTime: 0, meta: true, type: "setTempo", microsecondsPerBeat: 1_000_000 },
        { deltaTime: 96, meta: true, type: "endOfTrack" },
      ]],
    });

    const parsed = parseMidiBuffer(buffer);
    expect(parsed.bpm).toBe(120);
    expect(parsed.tempoChanges).toEqual([
      { tick: 0, microsecondsPerBeat: 500_000, bpm: 120 },
      { tick: 96, microsecondsPerBeat: 1_000_000, bpm: 60 },
    ]);
    expect(parsed.events[0].duration).toBe(0.5);
    expect(parsed.durationTicks).toBe(192);
    expect(parsed.durationSeconds).toBe(1);
  });

  it("ignores a note-off without a matching note-on", () => {
    const buffer = buildMidi({
      header: { format: 0, numTracks: 1, ticksPerBeat: 96 },
      tracks: [[
        { deltaTime: 0, type: "noteOff", channel: 0, noteNumber: 60, velocity: 0 },
        { deltaTime: 0, meta: true, type: "endOfTrack" },
      ]],
    });

    expect(parseMidiBuffer(buffer).noteCount).toBe(0);
  });
});
