import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  toNoteDocument,
  formatNoteDocument,
  createFileSink,
  createMemorySink,
} from "./output.js";
import { caught } from "./midi/smf.test-utils.js";

describe("toNoteDocument", () => {
  it("renames fields for output", () => {
    expect(toNoteDocument([{ pitch: 60, timeStart: 0, timeEnd: 0.5 }])).toEqual({
      notes: [{ time_start: 0, time_end: 0.5, pitch_value: 60 }],
    });
  });

  it("keeps note order", () => {
    const doc = toNoteDocument([
      { pitch: 72, timeStart: 1, timeEnd: 2 },
      { pitch: 48, timeStart: 2, timeEnd: 3 },
    ]);
    expect(doc.notes.map((n) => n.pitch_value)).toEqual([72, 48]);
  });
});

describe("formatNoteDocument", () => {
  it("pretty-prints with two spaces", () => {
    const text = formatNoteDocument({
      notes: [{ time_start: 0, time_end: 0.5, pitch_value: 60 }],
    });
    expect(text).toBe(
      '{\n  "notes": [\n    {\n      "time_start": 0,\n      "time_end": 0.5,\n      "pitch_value": 60\n    }\n  ]\n}',
    );
  });

  it("prints an empty list", () => {
    expect(formatNoteDocument({ notes: [] })).toBe('{\n  "notes": []\n}');
  });
});

describe("sinks", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const d of dirs.splice(0)) rmSync(d, { recursive: true, force: true });
  });

  function tempDir(): string {
    const d = mkdtempSync(join(tmpdir(), "midi2json-out-"));
    dirs.push(d);
    return d;
  }

  it("file sink creates missing directories", () => {
    const path = join(tempDir(), "output", "notes.json");
    const sink = createFileSink(path);
    sink.write({ notes: [] });
    expect(sink.target).toBe(path);
    expect(readFileSync(path, "utf8")).toBe('{\n  "notes": []\n}');
  });

  it("file sink reports write-failed", () => {
    const base = tempDir();
    const blocker = join(base, "file");
    writeFileSync(blocker, "x");
    const sink = createFileSink(join(blocker, "notes.json"));
    expect(caught(() => sink.write({ notes: [] }))).toMatchObject({ kind: "write-failed" });
  });

  it("memory sink collects documents", () => {
    const sink = createMemorySink();
    sink.write({ notes: [] });
    sink.write({ notes: [{ time_start: 1, time_end: 2, pitch_value: 3 }] });
    expect(sink.documents).toHaveLength(2);
    expect(sink.target).toBe("memory");
  });
});
