import { normalizeBpm, normalizeKey } from "./normalize";
import { FlatNote, NoteName, SharpNote } from "./types";

type AccidentalNote = SharpNote | FlatNote;

export const ENHARMONIC_MAP: Readonly<Record<AccidentalNote, AccidentalNote>> = Object.freeze({
  "A#": "Bb",
  Bb: "A#",
  "C#": "Db",
  Db: "C#",
  "D#": "Eb",
  Eb: "D#",
  "F#": "Gb",
  Gb: "F#",
  "G#": "Ab",
  Ab: "G#",
});

function isAccidentalNote(note: NoteName): note is AccidentalNote {
  return Object.prototype.hasOwnProperty.call(ENHARMONIC_MAP, note);
}

export function enharmonicOf(note: NoteName): NoteName | undefined {
  return isAccidentalNote(note) ? ENHARMONIC_MAP[note] : undefined;
}

export function bpmMatches(
  detected: string | null | undefined,
  expected: number,
  tolerance: number = 2
): boolean {
  const detectedBpm = normalizeBpm(detected);
  if (detectedBpm === undefined) {
    return false;
  }

  return Math.abs(detectedBpm - expected) <= tolerance;
}

/**
 * Mode has to agree first (major never matches minor); with tolerance on,
 * A# and Bb (and the other four pairs) are then treated as the same note.
 */
export function keyMatches(
  detected: string | null | undefined,
  expected: string | null | undefined,
  tolerance: boolean = true
): boolean {
  const detectedKey = normalizeKey(detected);
  const expectedKey = normalizeKey(expected);
  if (!detectedKey || !expectedKey) {
    return false;
  }

  if (detectedKey.note === expectedKey.note && detectedKey.mode === expectedKey.mode) {
    return true;
  }

  if (tolerance && detectedKey.mode === expectedKey.mode) {
    return enharmonicOf(detectedKey.note) === expectedKey.note;
  }

  return false;
}
