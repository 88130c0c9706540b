import { describe, it, expect } from "vitest";
import { parseConvertOptions, DEFAULT_OUTPUT_PATH } from "./schemas.js";
import { caught } from "./midi/smf.test-utils.js";

describe("parseConvertOptions", () => {
  it("applies defaults", () => {
    expect(parseConvertOptions({ input: "song.mid", bpm: 120 })).toEqual({
      input: "song.mid",
      bpm: 120,
      track: 0,
      output: DEFAULT_OUTPUT_PATH,
    });
  });

  it("defaults output to output/notes.json", () => {
    expect(DEFAULT_OUTPUT_PATH).toBe("output/notes.json");
  });

  it("keeps explicit values", () => {
    expect(parseConvertOptions({ input: "a.mid", bpm: 96.5, track: 2, output: "out.json" })).toEqual({
      input: "a.mid",
      bpm: 96.5,
      track: 2,
      output: "out.json",
    });
  });

  it.each([0, -1, NaN, Infinity])("rejects bpm %s as invalid-bpm", (bpm) => {
    expect(caught(() => parseConvertOptions({ input: "a.mid", bpm }))).toMatchObject({
      kind: "invalid-bpm",
    });
  });

  it("reports the failing field", () => {
    expect(caught(() => parseConvertOptions({ input: "a.mid", bpm: 0 }))).toMatchObject({
      message: "Invalid options: bpm: bpm must be greater than 0",
    });
  });

  it("rejects a missing input as invalid-options", () => {
    expect(caught(() => parseConvertOptions({ input: "", bpm: 120 }))).toMatchObject({
      kind: "invalid-options",
      message: "Invalid options: input: input path is required",
    });
  });

  it("rejects a fractional track index", () => {
    expect(caught(() => parseConvertOptions({ input: "a.mid", bpm: 120, track: 1.5 }))).toMatchObject({
      kind: "invalid-options",
    });
  });
});
