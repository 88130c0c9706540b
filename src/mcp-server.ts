#!/usr/bin/env node
// ─── midi2json: MCP Server ──────────────────────────────────────────────────
//
// Exposes MIDI → note conversion as MCP tools.
//
// Usage:
//   node dist/mcp-server.js          # stdio transport
//
// Tools:
//   extract_notes — notes of one track as a JSON document
//   convert_midi  — write the note document to disk
//   midi_info     — header fields and per-track event counts
// ─────────────────────────────────────────────────────────────────────────────

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { convertMidiFile, loadMidiFile, notesFromMidi } from "./convert.js";
import { ConversionError, errorMessage } from "./errors.js";
import { summarizeTracks } from "./midi/decoder.js";
import { ASSUMED_TICKS_PER_BEAT } from "./midi/timing.js";
import { formatNoteDocument, toNoteDocument } from "./output.js";
import { createStderrReporter } from "./reporter.js";
import { BpmSchema, DEFAULT_OUTPUT_PATH } from "./schemas.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function errorResult(err: unknown) {
  const prefix = err instanceof ConversionError ? `[${err.kind}] ` : "";
  return {
    content: [{ type: "text" as const, text: `${prefix}${errorMessage(err)}` }],
    isError: true,
  };
}

function textResult(text: string) {
  return { content: [{ type: "text" as const, text }] };
}

// ─── Server ─────────────────────────────────────────────────────────────────

const server = new McpServer({
  name: "midi2json",
  version: "0.1.0",
});

const trackParam = z.number().int().min(0).optional()
  .describe("Track index (default 0, the first track)");

// ─── Tool: extract_notes ────────────────────────────────────────────────────

server.tool(
  "extract_notes",
  "Extract the notes of one MIDI track as { notes: [{ time_start, time_end, pitch_value }] }. Times are seconds at the given tempo.",
  {
    path: z.string().min(1).describe("Path to a .mid file"),
    bpm: BpmSchema.describe("Tempo in beats per minute"),
    track: trackParam,
  },
  async ({ path, bpm, track }) => {
    try {
      const midi = loadMidiFile(path);
      const notes = notesFromMidi(midi, bpm, track ?? 0);
      return textResult(formatNoteDocument(toNoteDocument(notes)));
    } catch (err) {
      return errorResult(err);
    }
  }
);

// ─── Tool: convert_midi ─────────────────────────────────────────────────────

server.tool(
  "convert_midi",
  `Convert a MIDI file and write the note document to disk (default ${DEFAULT_OUTPUT_PATH}).`,
  {
    path: z.string().min(1).describe("Path to a .mid file"),
    bpm: BpmSchema.describe("Tempo in beats per minute"),
    track: trackParam,
    output: z.string().min(1).optional().describe(`Output JSON path (default ${DEFAULT_OUTPUT_PATH})`),
  },
  async ({ path, bpm, track, output }) => {
    try {
      const result = convertMidiFile(
        { input: path, bpm, track, output },
        { reporter: createStderrReporter() },
      );
      return textResult(`Wrote ${result.notes.length} note(s) to ${result.target}`);
    } catch (err) {
      return errorResult(err);
    }
  }
);

// ─── Tool: midi_info ────────────────────────────────────────────────────────

server.tool(
  "midi_info",
  "Show a MIDI file's format, resolution and per-track note counts.",
  {
    path: z.string().min(1).describe("Path to a .mid file"),
  },
  async ({ path }) => {
    try {
      const midi = loadMidiFile(path);
      const lines = [
        `Format: ${midi.format}`,
        `Ticks per beat: ${midi.ticksPerBeat ?? "n/a (SMPTE timing)"}` +
          (midi.ticksPerBeat === ASSUMED_TICKS_PER_BEAT ? "" : ` (conversion assumes ${ASSUMED_TICKS_PER_BEAT})`),
        `Tracks: ${midi.tracks.length}`,
        ...summarizeTracks(midi).map((t) =>
          `  Track ${t.index}: ${t.eventCount} events, ${t.noteBeginCount} note begins, ` +
            `${t.noteEndCount} note ends, ${t.lengthTicks} ticks`
        ),
      ];
      return textResult(lines.join("\n"));
    } catch (err) {
      return errorResult(err);
    }
  }
);

// ─── Start ──────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("midi2json MCP server running on stdio");
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
