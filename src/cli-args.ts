// ─── CLI Argument Parsing ───────────────────────────────────────────────────
//
// midi2json --input <file.mid> --bpm <tempo>
// ─────────────────────────────────────────────────────────────────────────────

import { ConversionError } from "./errors.js";

export const USAGE = "Usage: midi2json --input <file.mid> --bpm <tempo>";

export type CliCommand =
  | { command: "help" }
  | { command: "convert"; input: string; bpm: number };

/** Value following the first of `names`, or null. Another flag is not a value. */
export function getFlag(args: string[], ...names: string[]): string | null {
  for (const name of names) {
    const idx = args.indexOf(name);
    if (idx !== -1 && idx + 1 < args.length && !isFlag(args[idx + 1])) return args[idx + 1];
  }
  return null;
}

/** `-x` or `--xyz`. Negative numbers are values. */
function isFlag(arg: string): boolean {
  return /^--?[A-Za-z]/.test(arg);
}

/** Check for boolean flag (no value). */
export function hasFlag(args: string[], ...names: string[]): boolean {
  return names.some((name) => args.includes(name));
}

/**
 * Parse a tempo string. Throws `invalid-bpm` unless it is a finite number
 * above zero.
 */
export function parseBpm(raw: string): number {
  const trimmed = raw.trim();
  const bpm = trimmed === "" ? NaN : Number(trimmed);
  if (!Number.isFinite(bpm) || bpm <= 0) {
    throw new ConversionError("invalid-bpm", `Cannot parse BPM: "${raw}"`);
  }
  return bpm;
}

/**
 * Turn argv (without node and script) into a command.
 * Missing flags throw `invalid-options` with the usage line.
 */
export function parseCliArgs(args: string[]): CliCommand {
  if (hasFlag(args, "--help", "-h")) {
    return { command: "help" };
  }

  const input = getFlag(args, "--input", "-i");
  const bpmRaw = getFlag(args, "--bpm", "-b");
  const missing: string[] = [];
  if (input === null) missing.push("--input");
  if (bpmRaw === null) missing.push("--bpm");
  if (input === null || bpmRaw === null) {
    throw new ConversionError(
      "invalid-options",
      `Missing required argument(s): ${missing.join(", ")}\n${USAGE}`,
    );
  }

  return { command: "convert", input, bpm: parseBpm(bpmRaw) };
}
