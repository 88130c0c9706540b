#!/usr/bin/env node
// ─── midi2json: CLI Entry Point ─────────────────────────────────────────────
//
// Usage:
//   midi2json --input song.mid --bpm 120   # write output/notes.json
//   midi2json -i song.mid -b 96.5          # short flags
//   midi2json --help                       # show help
//
// Only the first track of the file is converted.
// ─────────────────────────────────────────────────────────────────────────────

import { convertMidiFile } from "./convert.js";
import { ConversionError } from "./errors.js";
import { parseCliArgs, USAGE } from "./cli-args.js";
import { createConsoleReporter } from "./reporter.js";
import { DEFAULT_OUTPUT_PATH } from "./schemas.js";

function cmdHelp(): void {
  console.log(`
midi2json — Converts MIDI files into note information in JSON

${USAGE}

Options:
  -i, --input <file>     MIDI file to read (first track only)
  -b, --bpm <tempo>      Tempo in beats per minute (number greater than 0)
  -h, --help             Show this help

Output is written to ${DEFAULT_OUTPUT_PATH}.

Example:
  midi2json --input melody.mid --bpm 120
`);
}

function main(): void {
  const parsed = parseCliArgs(process.argv.slice(2));

  switch (parsed.command) {
    case "help":
      cmdHelp();
      break;
    case "convert":
      convertMidiFile(
        { input: parsed.input, bpm: parsed.bpm, track: 0, output: DEFAULT_OUTPUT_PATH },
        { reporter: createConsoleReporter() },
      );
      break;
  }
}

try {
  main();
} catch (err) {
  if (err instanceof ConversionError) {
    console.error(`Error (${err.kind}): ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
}
