// ─── SMF Test Helpers ───────────────────────────────────────────────────────
//
// Builds standard MIDI file bytes in memory with midi-file's writer. Every
// track gets an End of Track meta event appended.
// ─────────────────────────────────────────────────────────────────────────────

import { writeMidi, type MidiEvent } from "midi-file";

export interface SmfOptions {
  format?: 0 | 1;
  ticksPerBeat?: number;
  /** Write velocity-0 note offs as Note-On (status 0x9n). */
  useByte9ForNoteOff?: boolean;
}

export function noteOn(deltaTime: number, noteNumber: number, velocity = 100, channel = 0): MidiEvent {
  return { deltaTime, type: "noteOn", channel, noteNumber, velocity };
}

export function noteOff(deltaTime: number, noteNumber: number, velocity = 0, channel = 0): MidiEvent {
  return { deltaTime, type: "noteOff", channel, noteNumber, velocity };
}

export function setTempo(deltaTime: number, bpm: number): MidiEvent {
  return {
    deltaTime,
    meta: true,
    type: "setTempo",
    microsecondsPerBeat: Math.round(60_000_000 / bpm),
  };
}

export function controller(deltaTime: number, controllerType: number, value: number, channel = 0): MidiEvent {
  return { deltaTime, type: "controller", channel, controllerType, value };
}

/**
 * Build an SMF from tracks of midi-file events.
 */
export function buildSmf(tracks: MidiEvent[][], options: SmfOptions = {}): Uint8Array {
  const endOfTrack: MidiEvent = { deltaTime: 0, meta: true, type: "endOfTrack" };
  const bytes = writeMidi(
    {
      header: {
        format: options.format ?? (tracks.length > 1 ? 1 : 0),
        numTracks: tracks.length,
        ticksPerBeat: options.ticksPerBeat ?? 96,
      },
      tracks: tracks.map((track) => [...track, endOfTrack]),
    },
    { useByte9ForNoteOff: options.useByte9ForNoteOff ?? false },
  );
  return new Uint8Array(bytes);
}

/** The value `fn` throws. Fails the test if it returns normally. */
export function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}
