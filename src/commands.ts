// ─── morse-midi: CLI Commands ────────────────────────────────────────────────
//
// One function per CLI mode. Each prints to the console and throws on
// failure; cli.ts turns the throw into an exit code.
// ─────────────────────────────────────────────────────────────────────────────

import { convertText, saveConversion } from "./convert.js";
import { parseOptions } from "./config/schema.js";
import { parseMidiFile } from "./midi/parser.js";
import { textToMorse } from "./morse/mapper.js";

// ─── Commands ───────────────────────────────────────────────────────────────

/** Prints the Morse code before the file is written. */
export function cmdConvert(text: string, bpm: number, out: string | undefined): void {
  console.log("Input text:", text);
  const conversion = convertText({ text, bpm, out });
  console.log("Morse code:", conversion.morse);
  const result = saveConversion(conversion, out);
  console.log(`MIDI file saved as ${result.path}`);
}

export function cmdPrint(text: string, bpm: number): void {
  console.log("Input text:", text);
  parseOptions({ text, bpm });
  console.log("Morse code:", textToMorse(text));
}

export function cmdInspect(path: string): void {
  const midi = parseMidiFile(path);
  console.log(`\n${path}`);
  console.log(`  Format: ${midi.format} | Tracks: ${midi.trackCount} | Ticks/beat: ${midi.ticksPerBeat}`);
  console.log(`  Tempo: ${midi.bpm} BPM (${midi.microsecondsPerBeat} µs/beat)`);
  console.log(`  Notes: ${midi.noteCount} | Duration: ${midi.durationSeconds.toFixed(2)}s (${midi.durationTicks} ticks)\n`);
}

export function cmdHelp(): void {
  console.log(`
morse-midi — Convert text to a Morse code MIDI file

Usage:
  morse-midi [options] <text...>

Options:
  --bpm <n>          Tempo in beats per minute (default 120, minimum 4)
  --out <file.mid>   Output path. Default: text with spaces as hyphens + .mid
  --print            Print the Morse code without writing a file
  --inspect <file>   Summarise an existing MIDI file
  --help, -h         Show this help

Only the letters a–z are encoded; other characters are skipped.

Examples:
  morse-midi sos
  morse-midi --bpm 90 hello world
`);
}
