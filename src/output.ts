// ─── Note Document Output ───────────────────────────────────────────────────
//
// The JSON document written at the end of a run, and the sinks that
// receive it. Field names are part of the output format and must not change.
// ─────────────────────────────────────────────────────────────────────────────

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { ConversionError, errorMessage } from "./errors.js";
import type { Note } from "./midi/types.js";

/** One note as serialized. */
export interface NoteRecord {
  time_start: number;
  time_end: number;
  pitch_value: number;
}

/** The container written to disk. */
export interface NoteDocument {
  notes: NoteRecord[];
}

/** Receives the finished document. Called once per successful run. */
export interface NoteSink {
  /** Human-readable destination for log lines. */
  readonly target: string;
  write(document: NoteDocument): void;
}

export function toNoteDocument(notes: readonly Note[]): NoteDocument {
  return {
    notes: notes.map((n) => ({
      time_start: n.timeStart,
      time_end: n.timeEnd,
      pitch_value: n.pitch,
    })),
  };
}

/** Pretty-printed JSON with two-space indent. */
export function formatNoteDocument(document: NoteDocument): string {
  return JSON.stringify(document, null, 2);
}

// ─── Sinks ──────────────────────────────────────────────────────────────────

/**
 * Writes the document to `path`, creating the parent directory if needed.
 */
export function createFileSink(path: string): NoteSink {
  return {
    target: path,
    write(document) {
      try {
        mkdirSync(dirname(path), { recursive: true });
        writeFileSync(path, formatNoteDocument(document), "utf8");
      } catch (err) {
        throw new ConversionError(
          "write-failed",
          `Failed to save notes to ${path}: ${errorMessage(err)}`,
          { cause: err },
        );
      }
    },
  };
}

/**
 * Keeps written documents in memory.
 * Use: `const sink = createMemorySink(); ... sink.documents`
 */
export function createMemorySink(): NoteSink & { documents: NoteDocument[] } {
  const documents: NoteDocument[] = [];
  return {
    target: "memory",
    documents,
    write(document) {
      documents.push(document);
    },
  };
}
