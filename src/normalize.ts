import { Mode, NaturalNote, NormalizedKey, NoteName } from "./types";

const NATURAL_NOTES: readonly NaturalNote[] = ["A", "B", "C", "D", "E", "F", "G"];

// Letter is case-insensitive, the accidental must be an ASCII "#" or a lowercase "b"
const NOTE_TOKEN = /^([A-Ga-g])([#b]?)/;

/**
 * Tempo as an integer, taken from the first run of digits in the string.
 *
 * Handles the spellings sources actually return: "99", "99.5", "~99",
 * "99 BPM", "BPM: 128". Any fractional part is dropped, not rounded.
 */
export function normalizeBpm(raw: string | null | undefined): number | undefined {
  if (!raw) {
    return undefined;
  }

  const match = raw.match(/\d+/);
  if (!match) {
    return undefined;
  }

  return parseInt(match[0], 10);
}

function toNatural(letter: string): NaturalNote | undefined {
  const upper = letter.toUpperCase();
  return NATURAL_NOTES.find((note) => note === upper);
}

/**
 * Parses "G Major", "g major", "G", "A#m", "A# Minor", "G♯ Minor", "Bb min"...
 * into a note and a mode. Returns undefined when the string does not start
 * with a note name.
 */
export function normalizeKey(raw: string | null | undefined): NormalizedKey | undefined {
  if (!raw) {
    return undefined;
  }

  const cleaned = raw
    .trim()
    .replace(/\s+/g, " ")
    .replace(/♯/g, "#")
    .replace(/♭/g, "b");

  const match = cleaned.match(NOTE_TOKEN);
  if (!match) {
    return undefined;
  }

  const natural = toNatural(match[1]);
  if (!natural) {
    return undefined;
  }
  const sign = match[2];
  const accidental = sign === "#" || sign === "b" ? sign : "";
  const note: NoteName = `${natural}${accidental}`;

  const lower = cleaned.toLowerCase();
  const remainder = lower.slice(match[0].length);
  const mode: Mode = remainder.includes("min") || lower.endsWith("m") ? "min" : "maj";

  return { note, mode };
}

/** "A# Minor", "G Major": the spelling normalizeKey reads back to the same value. */
export function renderKey(key: NormalizedKey): string {
  return `${key.note} ${key.mode === "min" ? "Minor" : "Major"}`;
}

/** Trimmed value, or undefined for null/empty/whitespace-only input. */
export function presentOrUndefined(value: string | null | undefined): string | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}
