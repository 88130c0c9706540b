// ─── Conversion Reporters ───────────────────────────────────────────────────
//
// Hooks the conversion pipeline calls at each stage.
//
// Implementations:
//   - ConsoleReporter: progress lines on stdout (CLI)
//   - StderrReporter: same lines on stderr (MCP server, stdout is the protocol)
//   - SilentReporter: no-op (testing)
//   - RecordingReporter: captures stages for assertions
// ─────────────────────────────────────────────────────────────────────────────

import type { DecodedMidi, Note } from "./midi/types.js";
import { ASSUMED_TICKS_PER_BEAT } from "./midi/timing.js";

export interface ConversionReporter {
  onLoad(path: string): void;
  onDecoded(midi: DecodedMidi): void;
  onPairing(trackIndex: number, eventCount: number): void;
  onNotes(notes: readonly Note[]): void;
  onSave(target: string): void;
  onDone(noteCount: number): void;
}

// ─── Line Reporter (console) ────────────────────────────────────────────────

function createLineReporter(log: (line: string) => void, warn: (line: string) => void): ConversionReporter {
  return {
    onLoad() {
      log("Loading MIDI file...");
    },

    onDecoded(midi) {
      if (midi.ticksPerBeat !== undefined && midi.ticksPerBeat !== ASSUMED_TICKS_PER_BEAT) {
        warn(
          `Warning: file uses ${midi.ticksPerBeat} ticks per beat; ` +
            `timing assumes ${ASSUMED_TICKS_PER_BEAT}.`,
        );
      }
    },

    onPairing() {
      log("Handling contents...");
    },

    onNotes(notes) {
      log("Notes:");
      for (const note of notes) {
        log(`  ${formatNoteLine(note)}`);
      }
    },

    onSave() {
      log("Saving output JSON file...");
    },

    onDone() {
      log("Done.");
    },
  };
}

/** `<start> to <end>: pitch <p>` */
export function formatNoteLine(note: Note): string {
  return `${note.timeStart} to ${note.timeEnd}: pitch ${note.pitch}`;
}

/**
 * Progress on stdout, warnings on stderr.
 */
export function createConsoleReporter(): ConversionReporter {
  return createLineReporter(
    (line) => console.log(line),
    (line) => console.error(line),
  );
}

/** Everything on stderr. */
export function createStderrReporter(): ConversionReporter {
  return createLineReporter(
    (line) => console.error(line),
    (line) => console.error(line),
  );
}

// ─── Silent Reporter (testing) ──────────────────────────────────────────────

export function createSilentReporter(): ConversionReporter {
  return {
    onLoad() {},
    onDecoded() {},
    onPairing() {},
    onNotes() {},
    onSave() {},
    onDone() {},
  };
}

// ─── Recording Reporter (testing) ───────────────────────────────────────────

/** A recorded pipeline stage. */
export type ReportEvent =
  | { type: "load"; path: string }
  | { type: "decoded"; format: number; ticksPerBeat?: number; trackCount: number }
  | { type: "pairing"; trackIndex: number; eventCount: number }
  | { type: "notes"; count: number }
  | { type: "save"; target: string }
  | { type: "done"; noteCount: number };

/**
 * Records every stage for test assertions.
 * Use: `const reporter = createRecordingReporter(); ... reporter.events`
 */
export function createRecordingReporter(): ConversionReporter & { events: ReportEvent[] } {
  const events: ReportEvent[] = [];

  return {
    events,

    onLoad(path) {
      events.push({ type: "load", path });
    },

    onDecoded(midi) {
      events.push({
        type: "decoded",
        format: midi.format,
        ticksPerBeat: midi.ticksPerBeat,
        trackCount: midi.tracks.length,
      });
    },

    onPairing(trackIndex, eventCount) {
      events.push({ type: "pairing", trackIndex, eventCount });
    },

    onNotes(notes) {
      events.push({ type: "notes", count: notes.length });
    },

    onSave(target) {
      events.push({ type: "save", target });
    },

    onDone(noteCount) {
      events.push({ type: "done", noteCount });
    },
  };
}
