// ─── Conversion Pipeline ─────────────────────────────────────────────────────
//
// text → Morse → MIDI bytes → file. Options are validated before anything
// is encoded; the file is written with a single call.
// ─────────────────────────────────────────────────────────────────────────────

import { writeFileSync } from "node:fs";
import { parseOptions, type ConversionInput } from "./config/schema.js";
import { PersistenceError } from "./errors.js";
import { createMorseMidi } from "./midi/chunks.js";
import { countMorseNotes, textToMorse } from "./morse/mapper.js";

export interface Conversion {
  text: string;
  morse: string;
  bpm: number;
  /** Complete MIDI file. */
  bytes: Uint8Array;
  /** Number of dots and dashes, i.e. note-on/note-off pairs. */
  noteCount: number;
}

export interface WrittenConversion extends Conversion {
  path: string;
}

/** "hello world" → "hello-world.mid" */
export function outputFileName(text: string): string {
  return `${text.replaceAll(" ", "-")}.mid`;
}

/**
 * Convert text to an in-memory MIDI file. Throws InputError for empty text
 * or an invalid BPM.
 */
export function convertText(input: ConversionInput): Conversion {
  const { text, bpm } = parseOptions(input);
  const morse = textToMorse(text);
  return {
    text,
    morse,
    bpm,
    bytes: createMorseMidi(morse, { bpm }),
    noteCount: countMorseNotes(morse),
  };
}

/**
 * Write a finished conversion to `out`, or to a name derived from its text.
 * Write failures surface as PersistenceError; a partial file is not cleaned
 * up.
 */
export function saveConversion(conversion: Conversion, out?: string): WrittenConversion {
  const path = out ?? outputFileName(conversion.text);

  try {
    writeFileSync(path, conversion.bytes);
  } catch (err) {
    throw new PersistenceError(path, err);
  }

  return { ...conversion, path };
}

/**
 * Convert text and write the MIDI file. Nothing is written unless the
 * options are valid.
 */
export function writeMorseMidi(input: ConversionInput): WrittenConversion {
  return saveConversion(convertText(input), input.out);
}
