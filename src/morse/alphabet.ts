// ─── Morse Alphabet ──────────────────────────────────────────────────────────
//
// International Morse code for the Latin letters a–z. Everything else
// (digits, punctuation) has no entry and is dropped by the mapper.
// ─────────────────────────────────────────────────────────────────────────────

export const MORSE_ALPHABET: Readonly<Record<string, string>> = Object.freeze({
  a: ".-",   b: "-...", c: "-.-.", d: "-..",  e: ".",
  f: "..-.", g: "--.",  h: "....", i: "..",   j: ".---",
  k: "-.-",  l: ".-..", m: "--",   n: "-.",   o: "---",
  p: ".--.", q: "--.-", r: ".-.",  s: "...",  t: "-",
  u: "..-",  v: "...-", w: ".--",  x: "-..-", y: "-.--",
  z: "--..",
});

/** Symbols that can appear in a Morse symbol stream. */
export const MORSE_SYMBOLS = [".", "-", " ", "/"] as const;

export type MorseSymbol = (typeof MORSE_SYMBOLS)[number];

export const DOT: MorseSymbol = ".";
export const DASH: MorseSymbol = "-";
export const LETTER_SEPARATOR: MorseSymbol = " ";
export const WORD_SEPARATOR: MorseSymbol = "/";
