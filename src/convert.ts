// ─── Conversion Pipeline ────────────────────────────────────────────────────
//
// MIDI file → note document. Reads and decodes the file, pairs the selected
// track's events into notes, then hands the document to a sink.
//
// Nothing reaches the sink unless every earlier step succeeded.
// ─────────────────────────────────────────────────────────────────────────────

import { readFileSync } from "node:fs";
import { ConversionError, errorMessage } from "./errors.js";
import { decodeMidi, selectTrack } from "./midi/decoder.js";
import { extractNotes } from "./midi/pairer.js";
import type { DecodedMidi, Note } from "./midi/types.js";
import { createFileSink, toNoteDocument, type NoteDocument, type NoteSink } from "./output.js";
import { createSilentReporter, type ConversionReporter } from "./reporter.js";
import { parseConvertOptions, type ConvertOptionsInput } from "./schemas.js";

export interface ConvertDependencies {
  /** Defaults to a file sink at the options' output path. */
  sink?: NoteSink;
  /** Defaults to silent. */
  reporter?: ConversionReporter;
}

export interface ConversionResult {
  notes: Note[];
  document: NoteDocument;
  /** Where the document was written. */
  target: string;
}

/**
 * Read a MIDI file from disk and decode it.
 * Throws `unreadable-input` or `invalid-midi`.
 */
export function loadMidiFile(path: string): DecodedMidi {
  let bytes: Uint8Array;
  try {
    bytes = readFileSync(path);
  } catch (err) {
    throw new ConversionError(
      "unreadable-input",
      `Could not read input file ${path}: ${errorMessage(err)}`,
      { cause: err },
    );
  }
  return decodeMidi(bytes);
}

/**
 * Extract notes from one track of a decoded file. No I/O.
 */
export function notesFromMidi(midi: DecodedMidi, bpm: number, trackIndex = 0): Note[] {
  return extractNotes(selectTrack(midi, trackIndex), bpm);
}

/**
 * Run a full conversion: validate options, load, pair, write.
 */
export function convertMidiFile(
  options: ConvertOptionsInput,
  deps: ConvertDependencies = {},
): ConversionResult {
  const opts = parseConvertOptions(options);
  const reporter = deps.reporter ?? createSilentReporter();
  const sink = deps.sink ?? createFileSink(opts.output);

  reporter.onLoad(opts.input);
  const midi = loadMidiFile(opts.input);
  reporter.onDecoded(midi);

  const track = selectTrack(midi, opts.track);
  reporter.onPairing(opts.track, track.length);
  const notes = extractNotes(track, opts.bpm);
  reporter.onNotes(notes);

  const document = toNoteDocument(notes);
  reporter.onSave(sink.target);
  sink.write(document);
  reporter.onDone(notes.length);

  return { notes, document, target: sink.target };
}
