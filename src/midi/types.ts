// ─── MIDI Track Types ───────────────────────────────────────────────────────
//
// Types for a decoded MIDI track and the notes extracted from it.
// Events keep MIDI delta-time semantics (ticks since the previous event);
// notes carry absolute wall-clock seconds.
// ─────────────────────────────────────────────────────────────────────────────

/** Note-On with a non-zero velocity. */
export interface NoteBeginMessage {
  kind: "noteBegin";
  /** MIDI channel (0–15). */
  channel: number;
  /** MIDI key number. 60 = middle C. */
  pitch: number;
  velocity: number;
}

/** Note-Off, or Note-On with velocity 0. */
export interface NoteEndMessage {
  kind: "noteEnd";
  channel: number;
  pitch: number;
  velocity: number;
}

/** Any other channel, meta or sysex event. Only its delta time matters. */
export interface OtherMessage {
  kind: "other";
  /** Event type name as reported by the decoder (e.g. "setTempo"). */
  type: string;
}

export type TrackMessage = NoteBeginMessage | NoteEndMessage | OtherMessage;

/** One entry of a MIDI track. */
export interface TimedEvent {
  /** Ticks elapsed since the previous event in the track. */
  deltaTicks: number;
  message: TrackMessage;
}

/** A finished note with absolute timing. */
export interface Note {
  /** MIDI key number (0–127 by convention, not validated). */
  pitch: number;
  /** Start time in seconds from the beginning of the track. */
  timeStart: number;
  /** End time in seconds. Never earlier than timeStart for ordered input. */
  timeEnd: number;
}

/** A note whose start has been seen but whose end has not. */
export interface PendingNote {
  pitch: number;
  timeStart: number;
}

/** Result of decoding a standard MIDI file. */
export interface DecodedMidi {
  /** MIDI format (0 = single track, 1 = multi-track, 2 = multi-song). */
  format: number;
  /** Ticks per quarter note from the header, absent for SMPTE timing. */
  ticksPerBeat?: number;
  /** Tracks in file order. */
  tracks: TimedEvent[][];
}
