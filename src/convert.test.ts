import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, readFileSync, existsSync, readdirSync } from "node:fs";
import { cwd, chdir } from "node:process";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { convertText, writeMorseMidi, outputFileName } from "./convert.js";
import { InputError, PersistenceError } from "./errors.js";

describe("outputFileName", () => {
  it("replaces spaces with hyphens", () => {
    expect(outputFileName("hello world")).toBe("hello-world.mid");
    expect(outputFileName("a  b")).toBe("a--b.mid");
    expect(outputFileName("SOS")).toBe("SOS.mid");
  });
});

describe("convertText", () => {
  it("converts sos at the default tempo", () => {
    const result = convertText({ text: "sos" });
    expect(result.morse).toBe("...---...");
    expect(result.bpm).toBe(120);
    expect(result.noteCount).toBe(9);
    expect(result.bytes).toHaveLength(108);
  });

  it("rejects empty and whitespace-only text", () => {
    expect(() => convertText({ text: "" })).toThrow(InputError);
    expect(() => convertText({ text: "   " })).toThrow("no text provided");
  });

  it("rejects a BPM too slow for the tempo field", () => {
    expect(() => convertText({ text: "sos", bpm: 3 })).toThrow(InputError);
  });

  it("encodes text with no letters as an empty track", () => {
    const result = convertText({ text: "42" });
    expect(result.morse).toBe("");
    expect(result.noteCount).toBe(0);
    expect(result.bytes).toHaveLength(14 + 8 + 11);
  });
});

describe("writeMorseMidi", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "morse-midi-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes the whole file", () => {
    const out = join(dir, "sos.mid");
    const result = writeMorseMidi({ text: "sos", bpm: 60, out });

    expect(result.path).toBe(out);
    const written = readFileSync(out);
    expect(written.length).toBe(108);
    expect([...written.subarray(25, 29)]).toEqual([0x03, 0x0f, 0x42, 0x40]);
  });

  it("writes nothing for empty input", () => {
    const out = join(dir, "empty.mid");
    expect(() => writeMorseMidi({ text: " ", out })).toThrow(InputError);
    expect(existsSync(out)).toBe(false);
    expect(readdirSync(dir)).toEqual([]);
  });

  it("writes nothing under the derived name for whitespace-only text", () => {
    const previous = cwd();
    chdir(dir);
    try {
      expect(() => writeMorseMidi({ text: "   " })).toThrow(InputError);
      expect(existsSync(join(dir, "---.mid"))).toBe(false);
      expect(readdirSync(dir)).toEqual([]);
    } finally {
      chdir(previous);
    }
  });

  it("writes to the name derived from the text by default", () => {
    const previous = cwd();
    chdir(dir);
    try {
      const result = writeMorseMidi({ text: "sos sos" });
      expect(result.path).toBe("sos-sos.mid");
      expect(readdirSync(dir)).toEqual(["sos-sos.mid"]);
    } finally {
      chdir(previous);
    }
  });

  it("reports write failures as PersistenceError", () => {
    const out = join(dir, "missing", "sos.mid");
    let caught: unknown;
    try {
      writeMorseMidi({ text: "sos", out });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(PersistenceError);
    if (caught instanceof PersistenceError) {
      expect(caught.code).toBe("PERSISTENCE");
      expect(caught.path).toBe(out);
      expect(caught.message).toContain("ENOENT");
    }
  });
});
