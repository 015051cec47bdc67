// ─── CLI Argument Parsing ────────────────────────────────────────────────────
//
// Positional words are the text to convert, joined with single spaces.
// Flags may appear anywhere; "--" ends flag parsing.
// ─────────────────────────────────────────────────────────────────────────────

import { InputError } from "./errors.js";
import { DEFAULT_BPM } from "./midi/types.js";

export type CliCommand =
  | { kind: "help" }
  | { kind: "inspect"; path: string }
  | { kind: "convert"; text: string; bpm: number; out?: string; print: boolean };

const VALUE_FLAGS = ["--bpm", "--out", "--inspect"] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(name: string): name is ValueFlag {
  return (VALUE_FLAGS as readonly string[]).includes(name);
}

/**
 * Parse argv (without the node/script prefix) into a command.
 */
export function parseCliArgs(args: readonly string[]): CliCommand {
  const words: string[] = [];
  const values = new Map<ValueFlag, string>();
  let print = false;
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--") {
      words.push(...args.slice(i + 1));
      break;
    }
    if (arg === "--help" || arg === "-h") {
      help = true;
      continue;
    }
    if (arg === "--print") {
      print = true;
      continue;
    }
    if (!arg.startsWith("--")) {
      words.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg : arg.slice(0, eq);
    if (!isValueFlag(name)) {
      throw new InputError(`flag provided but not defined: ${name}`);
    }
    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else if (i + 1 < args.length) {
      value = args[++i];
    }
    if (value === undefined) {
      throw new InputError(`flag needs an argument: ${name}`);
    }
    values.set(name, value);
  }

  if (help) return { kind: "help" };

  const inspectPath = values.get("--inspect");
  if (inspectPath !== undefined) return { kind: "inspect", path: inspectPath };

  const bpmStr = values.get("--bpm");
  return {
    kind: "convert",
    text: words.join(" "),
    bpm: bpmStr === undefined ? DEFAULT_BPM : parseIntFlag("--bpm", bpmStr),
    out: values.get("--out"),
    print,
  };
}

function parseIntFlag(flag: string, value: string): number {
  if (!/^[+-]?\d+$/.test(value)) {
    throw new InputError(`invalid value "${value}" for flag ${flag}`);
  }
  return parseInt(value, 10);
}
