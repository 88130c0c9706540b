// ─── Conversion Errors ──────────────────────────────────────────────────────
//
// Every failure in a conversion run is fatal. Errors carry a `kind` so the
// CLI and MCP server can report them without parsing messages.
// ─────────────────────────────────────────────────────────────────────────────

export const ERROR_KINDS = [
  "unreadable-input",
  "invalid-midi",
  "invalid-bpm",
  "invalid-options",
  "missing-track",
  "unmatched-note-end",
  "write-failed",
] as const;

export type ConversionErrorKind = (typeof ERROR_KINDS)[number];

export class ConversionError extends Error {
  readonly kind: ConversionErrorKind;

  constructor(kind: ConversionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConversionError";
    this.kind = kind;
  }
}

/** Narrow an unknown thrown value to a ConversionError of the given kind. */
export function isConversionError(
  err: unknown,
  kind?: ConversionErrorKind,
): err is ConversionError {
  return err instanceof ConversionError && (kind === undefined || err.kind === kind);
}

/** Message text for any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
