// ─── MIDI Decoder ───────────────────────────────────────────────────────────
//
// Parses standard MIDI file bytes with midi-file and maps each track entry
// onto a TimedEvent. Every Note-On begins a note, whatever its velocity;
// only Note-Off ends one.
// ─────────────────────────────────────────────────────────────────────────────

import { parseMidi, type MidiData, type MidiEvent } from "midi-file";
import { ConversionError, errorMessage } from "../errors.js";
import type { DecodedMidi, TimedEvent, TrackMessage } from "./types.js";

/**
 * Decode a MIDI buffer into tracks of timed events.
 * Throws `invalid-midi` if the bytes are not a standard MIDI file.
 */
export function decodeMidi(data: Uint8Array): DecodedMidi {
  let midi: MidiData;
  try {
    midi = parseMidi(data);
  } catch (err) {
    throw new ConversionError(
      "invalid-midi",
      `Could not parse MIDI file contents: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  return {
    format: midi.header.format,
    ticksPerBeat: midi.header.ticksPerBeat,
    tracks: midi.tracks.map((track) => track.map(toTimedEvent)),
  };
}

/**
 * Pick one track. Throws `missing-track` if the index is out of range.
 */
export function selectTrack(midi: DecodedMidi, index = 0): TimedEvent[] {
  const track = midi.tracks[index];
  if (!track) {
    throw new ConversionError(
      "missing-track",
      `Track ${index} not found (file has ${midi.tracks.length} track(s))`,
    );
  }
  return track;
}

// ─── Internal ────────────────────────────────────────────────────────────────

function toTimedEvent(event: MidiEvent): TimedEvent {
  return { deltaTicks: event.deltaTime, message: toMessage(event) };
}

function toMessage(event: MidiEvent): TrackMessage {
  // midi-file reports a velocity-0 Note-On as noteOff with byte9 set.
  // It is still a Note-On on the wire, so it begins a note.
  if (event.type === "noteOn" || (event.type === "noteOff" && event.byte9 === true)) {
    return {
      kind: "noteBegin",
      channel: event.channel,
      pitch: event.noteNumber,
      velocity: event.velocity,
    };
  }
  if (event.type === "noteOff") {
    return {
      kind: "noteEnd",
      channel: event.channel,
      pitch: event.noteNumber,
      velocity: event.velocity,
    };
  }
  return { kind: "other", type: event.type };
}

// ─── Summary ─────────────────────────────────────────────────────────────────

/** Event counts for one track. */
export interface TrackSummary {
  index: number;
  eventCount: number;
  noteBeginCount: number;
  noteEndCount: number;
  /** Absolute tick of the last event. */
  lengthTicks: number;
}

export function summarizeTracks(midi: DecodedMidi): TrackSummary[] {
  return midi.tracks.map((track, index) => {
    let noteBeginCount = 0;
    let noteEndCount = 0;
    let lengthTicks = 0;
    for (const event of track) {
      lengthTicks += event.deltaTicks;
      if (event.message.kind === "noteBegin") noteBeginCount++;
      else if (event.message.kind === "noteEnd") noteEndCount++;
    }
    return { index, eventCount: track.length, noteBeginCount, noteEndCount, lengthTicks };
  });
}
