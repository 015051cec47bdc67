// ─── Symbol Mapper ───────────────────────────────────────────────────────────
//
// Converts free text into a Morse symbol stream:
//   "sos sos" → "...---.../...---..."
//
// Letters inside a word are separated by a space, words by "/".
// ─────────────────────────────────────────────────────────────────────────────

import {
  MORSE_ALPHABET,
  MORSE_SYMBOLS,
  DOT,
  DASH,
  LETTER_SEPARATOR,
  WORD_SEPARATOR,
  type MorseSymbol,
} from "./alphabet.js";

/**
 * Translate text to Morse code.
 *
 * Words are split on the literal space character only, so two consecutive
 * spaces yield an empty word: "a  b" → ".-//-...". Characters without a
 * Morse code are dropped without a placeholder.
 */
export function textToMorse(text: string): string {
  return text
    .toLowerCase()
    .split(" ")
    .map(wordToMorse)
    .join(WORD_SEPARATOR);
}

function wordToMorse(word: string): string {
  const codes: string[] = [];
  for (const char of word) {
    const code = MORSE_ALPHABET[char];
    if (code === undefined) continue;
    codes.push(code);
  }
  return codes.join(LETTER_SEPARATOR);
}

export function isMorseSymbol(char: string): char is MorseSymbol {
  return (MORSE_SYMBOLS as readonly string[]).includes(char);
}

/** Number of dots and dashes, i.e. how many notes the track will carry. */
export function countMorseNotes(morse: string): number {
  let count = 0;
  for (const char of morse) {
    if (char === DOT || char === DASH) count++;
  }
  return count;
}
