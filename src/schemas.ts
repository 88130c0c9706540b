// ─── Conversion Option Schemas ──────────────────────────────────────────────
//
// Zod schemas for the options a conversion run accepts, shared by the CLI,
// the MCP server and library callers.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import { ConversionError } from "./errors.js";

/** Where the note document goes unless told otherwise. */
export const DEFAULT_OUTPUT_PATH = "output/notes.json";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

export const BpmSchema = z
  .number({ invalid_type_error: "bpm must be a number" })
  .finite("bpm must be finite")
  .positive("bpm must be greater than 0");

export const ConvertOptionsSchema = z.object({
  input: z.string().min(1, "input path is required"),
  bpm: BpmSchema,
  track: z.number().int().min(0).default(0),
  output: z.string().min(1).default(DEFAULT_OUTPUT_PATH),
});

// ─── Derived Types ───────────────────────────────────────────────────────────

/** Fully resolved options, defaults applied. */
export type ConvertOptions = z.infer<typeof ConvertOptionsSchema>;

/** Options as callers write them. */
export type ConvertOptionsInput = z.input<typeof ConvertOptionsSchema>;

// ─── Validation ──────────────────────────────────────────────────────────────

/**
 * Validate raw options and apply defaults.
 * A bad tempo is reported as `invalid-bpm`, anything else as `invalid-options`.
 */
export function parseConvertOptions(raw: unknown): ConvertOptions {
  const result = ConvertOptionsSchema.safeParse(raw);
  if (result.success) return result.data;

  const issues = result.error.issues;
  const kind = issues.some((i) => i.path[0] === "bpm") ? "invalid-bpm" : "invalid-options";
  const detail = issues
    .map((i) => `${i.path.join(".") || "root"}: ${i.message}`)
    .join("; ");
  throw new ConversionError(kind, `Invalid options: ${detail}`);
}
