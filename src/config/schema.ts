// ─── Conversion Options Schema ───────────────────────────────────────────────
//
// Options accepted by the CLI and the MCP server, validated with zod before
// any conversion or file write happens.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import { InputError } from "../errors.js";
import { DEFAULT_BPM } from "../midi/types.js";

/** Slowest tempo whose µs-per-beat still fits the 24-bit tempo field. */
export const MIN_BPM = 4;
/** Fastest tempo that still yields at least 1 µs per beat. */
export const MAX_BPM = 60_000_000;

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

export const ConversionOptionsSchema = z.object({
  text: z.string().refine((t) => t.trim() !== "", {
    message: "no text provided, please provide text to convert to Morse code",
  }),
  bpm: z.number().int().min(MIN_BPM).max(MAX_BPM).default(DEFAULT_BPM),
  out: z.string().min(1).optional(),
});

// ─── Derived Types ───────────────────────────────────────────────────────────

/** Validated options (bpm filled in). */
export type ConversionOptions = z.infer<typeof ConversionOptionsSchema>;
/** Options as callers pass them (bpm optional). */
export type ConversionInput = z.input<typeof ConversionOptionsSchema>;

// ─── Validation ──────────────────────────────────────────────────────────────

export interface ConfigError {
  field: string;
  message: string;
}

/**
 * Validate raw options. Returns an empty array if valid.
 */
export function validateOptions(raw: unknown): ConfigError[] {
  const result = ConversionOptionsSchema.safeParse(raw);
  if (result.success) return [];

  return result.error.issues.map((issue) => ({
    field: issue.path.join(".") || "root",
    message: issue.message,
  }));
}

/**
 * Parse raw options, throwing an InputError that lists every issue.
 */
export function parseOptions(raw: unknown): ConversionOptions {
  const result = ConversionOptionsSchema.safeParse(raw);
  if (result.success) return result.data;

  const issues = result.error.issues.map((i) =>
    i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message
  );
  throw new InputError(issues.join("; "));
}
