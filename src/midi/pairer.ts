// ─── Note Pairer ────────────────────────────────────────────────────────────
//
// Folds a track's events into finished notes. Each NoteBegin opens the
// single pending slot and the next NoteEnd closes it.
//
// The pairer is monophonic: a NoteBegin while a note is pending replaces
// it, and a note still pending at the end of the track is dropped. Neither
// case is an error. A NoteEnd with nothing pending aborts the run.
// ─────────────────────────────────────────────────────────────────────────────

import { ConversionError } from "../errors.js";
import type { Note, PendingNote, TimedEvent } from "./types.js";
import { assertValidBpm, ticksToSeconds } from "./timing.js";

export class NotePairer {
  readonly bpm: number;

  private _elapsedTicks = 0;
  private _pending: PendingNote | null = null;
  private _eventIndex = 0;
  private readonly _notes: Note[] = [];

  constructor(bpm: number) {
    assertValidBpm(bpm);
    this.bpm = bpm;
  }

  /** Absolute tick position of the last consumed event. */
  get elapsedTicks(): number {
    return this._elapsedTicks;
  }

  /** The open note, if any. */
  get pending(): PendingNote | null {
    return this._pending;
  }

  /** Notes finished so far, in NoteEnd order. */
  get notes(): readonly Note[] {
    return this._notes;
  }

  /** Consume one event. */
  push(event: TimedEvent): void {
    this._elapsedTicks += event.deltaTicks;
    const index = this._eventIndex++;
    const { message } = event;

    switch (message.kind) {
      case "noteBegin":
        this._pending = {
          pitch: message.pitch,
          timeStart: ticksToSeconds(this._elapsedTicks, this.bpm),
        };
        break;

      case "noteEnd": {
        const open = this._pending;
        if (!open) {
          throw new ConversionError(
            "unmatched-note-end",
            `Note end (pitch ${message.pitch}) at tick ${this._elapsedTicks} ` +
              `(event ${index}) has no pending note begin`,
          );
        }
        this._notes.push({
          pitch: open.pitch,
          timeStart: open.timeStart,
          timeEnd: ticksToSeconds(this._elapsedTicks, this.bpm),
        });
        this._pending = null;
        break;
      }

      case "other":
        break;
    }
  }

  /** Consume events in order. */
  pushAll(events: Iterable<TimedEvent>): void {
    for (const event of events) {
      this.push(event);
    }
  }

  /**
   * Return the finished notes. Any pending note is left out.
   */
  finish(): Note[] {
    return [...this._notes];
  }
}

/**
 * Extract notes from one track at a fixed tempo.
 * Throws `unmatched-note-end` without returning any notes if the track is
 * inconsistent.
 */
export function extractNotes(events: Iterable<TimedEvent>, bpm: number): Note[] {
  const pairer = new NotePairer(bpm);
  pairer.pushAll(events);
  return pairer.finish();
}
