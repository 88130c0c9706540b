// ─── midi2json ──────────────────────────────────────────────────────────────
//
// Extracts notes from a MIDI track and times them in seconds at a given tempo.
//
// Usage:
//   import { convertMidiFile, extractNotes } from "midi2json";
// ─────────────────────────────────────────────────────────────────────────────

// Core
export { ticksToSeconds, assertValidBpm, ASSUMED_TICKS_PER_BEAT, TICKS_PER_SECOND_PER_BPM } from "./midi/timing.js";
export { NotePairer, extractNotes } from "./midi/pairer.js";

// Decoder
export { decodeMidi, selectTrack, summarizeTracks } from "./midi/decoder.js";
export type { TrackSummary } from "./midi/decoder.js";

export type {
  TimedEvent,
  TrackMessage,
  NoteBeginMessage,
  NoteEndMessage,
  OtherMessage,
  Note,
  PendingNote,
  DecodedMidi,
} from "./midi/types.js";

// Pipeline
export { convertMidiFile, loadMidiFile, notesFromMidi } from "./convert.js";
export type { ConvertDependencies, ConversionResult } from "./convert.js";

// Output
export {
  toNoteDocument,
  formatNoteDocument,
  createFileSink,
  createMemorySink,
} from "./output.js";
export type { NoteDocument, NoteRecord, NoteSink } from "./output.js";

// Reporters
export {
  createConsoleReporter,
  createStderrReporter,
  createSilentReporter,
  createRecordingReporter,
  formatNoteLine,
} from "./reporter.js";
export type { ConversionReporter, ReportEvent } from "./reporter.js";

// Options
export {
  ConvertOptionsSchema,
  BpmSchema,
  parseConvertOptions,
  DEFAULT_OUTPUT_PATH,
} from "./schemas.js";
export type { ConvertOptions, ConvertOptionsInput } from "./schemas.js";

// Errors
export { ConversionError, isConversionError, ERROR_KINDS } from "./errors.js";
export type { ConversionErrorKind } from "./errors.js";
