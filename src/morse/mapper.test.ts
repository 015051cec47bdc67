import { describe, it, expect } from "vitest";
import { textToMorse, isMorseSymbol, countMorseNotes } from "./mapper.js";
import { MORSE_ALPHABET } from "./alphabet.js";

describe("textToMorse", () => {
  it("encodes SOS", () => {
    expect(textToMorse("SOS")).toBe("...---...");
  });

  it("is case-insensitive", () => {
    expect(textToMorse("Hello")).toBe(textToMorse("hello"));
    expect(textToMorse("HELLO")).toBe(".... . .-.. .-.. ---");
  });

  it("joins words with /", () => {
    expect(textToMorse("sos sos")).toBe("...---.../...---...");
  });

  it("separates letters inside a word with a space", () => {
    expect(textToMorse("ab")).toBe(".- -...");
  });

  it("drops characters without a code", () => {
    expect(textToMorse("hello, world!")).toBe(".... . .-.. .-.. ---/.-- --- .-. .-.. -..");
    expect(textToMorse("s0s")).toBe("... ...");
    expect(textToMorse("123")).toBe("");
    expect(textToMorse("café")).toBe("-.-. .- ..-.");
  });

  it("keeps empty words from consecutive spaces", () => {
    expect(textToMorse("a  b")).toBe(".-//-...");
    expect(textToMorse(" e")).toBe("/.");
  });

  it("splits on the space character only", () => {
    expect(textToMorse("a\tb")).toBe(".- -...");
  });

  it("is idempotent on lowercase input", () => {
    const input = "the quick brown fox";
    expect(textToMorse(input.toLowerCase())).toBe(textToMorse(input));
  });

  it("only emits Morse symbols", () => {
    const morse = textToMorse("Pack my box with 5 dozen liquor jugs!");
    expect([...morse].every(isMorseSymbol)).toBe(true);
  });
});

describe("MORSE_ALPHABET", () => {
  it("covers the 26 letters", () => {
    expect(Object.keys(MORSE_ALPHABET)).toHaveLength(26);
    expect(MORSE_ALPHABET.e).toBe(".");
    expect(MORSE_ALPHABET.q).toBe("--.-");
  });
});

describe("countMorseNotes", () => {
  it("counts dots and dashes only", () => {
    expect(countMorseNotes("...---...")).toBe(9);
    expect(countMorseNotes(".- -.../.")).toBe(7);
    expect(countMorseNotes("/ /")).toBe(0);
  });
});
