#!/usr/bin/env node
// ─── morse-midi: MCP Server ──────────────────────────────────────────────────
//
// Exposes the Morse → MIDI pipeline as MCP tools so an LLM can encode text
// and check the resulting files.
//
// Usage:
//   node dist/mcp-server.js          # stdio transport
//
// Tools:
//   text_to_morse      — translate text to Morse code
//   create_morse_midi  — write a Morse code MIDI file
//   inspect_midi       — summarise a MIDI file on disk
// ─────────────────────────────────────────────────────────────────────────────

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { writeMorseMidi } from "./convert.js";
import { MIN_BPM, MAX_BPM } from "./config/schema.js";
import { parseMidiFile } from "./midi/parser.js";
import { textToMorse, countMorseNotes } from "./morse/mapper.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function errorResult(err: unknown) {
  return {
    content: [{ type: "text" as const, text: `Error: ${err instanceof Error ? err.message : String(err)}` }],
    isError: true,
  };
}

// ─── Server ─────────────────────────────────────────────────────────────────

const server = new McpServer({
  name: "morse-midi",
  version: "0.1.0",
});

// ─── Tool: text_to_morse ────────────────────────────────────────────────────

server.tool(
  "text_to_morse",
  "Translate text to Morse code. Letters a–z only; other characters are skipped. Letters are separated by spaces, words by '/'.",
  {
    text: z.string().describe("Text to translate"),
  },
  async ({ text }) => {
    const morse = textToMorse(text);
    return {
      content: [{ type: "text", text: `${morse}\n\n(${countMorseNotes(morse)} dots and dashes)` }],
    };
  }
);

// ─── Tool: create_morse_midi ────────────────────────────────────────────────

server.tool(
  "create_morse_midi",
  "Encode text as Morse code and write it as a single-track MIDI file (E5, 96 ticks per beat).",
  {
    text: z.string().describe("Text to encode"),
    bpm: z.number().int().min(MIN_BPM).max(MAX_BPM).optional().describe("Tempo in BPM (default 120)"),
    out: z.string().optional().describe("Output path. Default: text with spaces as hyphens + .mid"),
  },
  async ({ text, bpm, out }) => {
    try {
      const result = writeMorseMidi({ text, bpm, out });
      return {
        content: [{
          type: "text",
          text: [
            `MIDI file saved as ${result.path}`,
            `Morse code: ${result.morse}`,
            `Tempo: ${result.bpm} BPM | Notes: ${result.noteCount} | Size: ${result.bytes.length} bytes`,
          ].join("\n"),
        }],
      };
    } catch (err) {
      return errorResult(err);
    }
  }
);

// ─── Tool: inspect_midi ─────────────────────────────────────────────────────

server.tool(
  "inspect_midi",
  "Summarise a MIDI file: format, tracks, tempo, note count and duration.",
  {
    path: z.string().describe("Path to a .mid file"),
  },
  async ({ path }) => {
    try {
      const midi = parseMidiFile(path);
      const text = [
        `# ${path}`,
        `**Format:** ${midi.format} | **Tracks:** ${midi.trackCount} | **Ticks/beat:** ${midi.ticksPerBeat}`,
        `**Tempo:** ${midi.bpm} BPM (${midi.microsecondsPerBeat} µs/beat)`,
        `**Notes:** ${midi.noteCount} | **Duration:** ${midi.durationSeconds.toFixed(2)}s`,
      ].join("\n");
      return { content: [{ type: "text", text }] };
    } catch (err) {
      return errorResult(err);
    }
  }
);

// ─── Start ──────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("morse-midi MCP server running on stdio");
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
