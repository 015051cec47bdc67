#!/usr/bin/env node
// ─── morse-midi: CLI Entry Point ─────────────────────────────────────────────
//
// Usage:
//   morse-midi sos                       # writes sos.mid at 120 BPM
//   morse-midi --bpm 90 hello world      # writes hello-world.mid
//   morse-midi --out beep.mid sos        # explicit output path
//   morse-midi --print sos               # print Morse only, no file
//   morse-midi --inspect sos.mid         # summarise a MIDI file
// ─────────────────────────────────────────────────────────────────────────────

import { parseCliArgs } from "./cli-args.js";
import { cmdConvert, cmdHelp, cmdInspect, cmdPrint } from "./commands.js";

// ─── Main ───────────────────────────────────────────────────────────────────

function main(): void {
  const command = parseCliArgs(process.argv.slice(2));

  switch (command.kind) {
    case "help":
      cmdHelp();
      break;
    case "inspect":
      cmdInspect(command.path);
      break;
    case "convert":
      if (command.print) {
        cmdPrint(command.text, command.bpm);
      } else {
        cmdConvert(command.text, command.bpm, command.out);
      }
      break;
  }
}

try {
  main();
} catch (err) {
  console.log("Error:", err instanceof Error ? err.message : String(err));
  console.log("Use --help for more information.");
  process.exit(1);
}
