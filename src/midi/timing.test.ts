import { describe, it, expect } from "vitest";
import { ticksToSeconds, assertValidBpm, TICKS_PER_SECOND_PER_BPM } from "./timing.js";
import { ConversionError } from "../errors.js";
import { caught } from "./smf.test-utils.js";

describe("ticksToSeconds", () => {
  it("uses 1.6 ticks per second per BPM", () => {
    expect(TICKS_PER_SECOND_PER_BPM).toBe(1.6);
  });

  it("converts at 120 BPM", () => {
    expect(ticksToSeconds(0, 120)).toBe(0);
    expect(ticksToSeconds(48, 120)).toBe(0.25);
    expect(ticksToSeconds(192, 120)).toBe(1);
  });

  it("converts at 60 BPM", () => {
    expect(ticksToSeconds(0, 60)).toBe(0);
    expect(ticksToSeconds(48, 60)).toBe(0.5);
    expect(ticksToSeconds(96, 60)).toBe(1);
  });

  it("tick 0 is 0 seconds at any tempo", () => {
    for (const bpm of [1, 33.3, 96, 240, 1000]) {
      expect(ticksToSeconds(0, bpm)).toBe(0);
    }
  });

  it("is non-decreasing in ticks", () => {
    for (const bpm of [40, 90.5, 120, 300]) {
      let prev = -1;
      for (let ticks = 0; ticks <= 2000; ticks += 37) {
        const s = ticksToSeconds(ticks, bpm);
        expect(s).toBeGreaterThanOrEqual(prev);
        prev = s;
      }
    }
  });

  it("is non-increasing in bpm", () => {
    for (const ticks of [0, 1, 96, 1234]) {
      let prev = Infinity;
      for (const bpm of [10, 20, 60, 61, 120, 250]) {
        const s = ticksToSeconds(ticks, bpm);
        expect(s).toBeLessThanOrEqual(prev);
        prev = s;
      }
    }
  });
});

describe("assertValidBpm", () => {
  it("accepts positive tempos", () => {
    expect(() => assertValidBpm(120)).not.toThrow();
    expect(() => assertValidBpm(0.5)).not.toThrow();
  });

  it.each([0, -60, NaN, Infinity])("rejects %s", (bpm) => {
    const err = caught(() => assertValidBpm(bpm));
    expect(err).toBeInstanceOf(ConversionError);
    expect(err).toMatchObject({ kind: "invalid-bpm" });
  });
});
