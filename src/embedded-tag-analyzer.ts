import * as fs from "fs";
import { parseFile } from "music-metadata";
import { TrackInfoUsageError } from "./errors";
import { normalizeKey, presentOrUndefined } from "./normalize";
import { AudioHandle, LocalAnalyzer, RawMetadata } from "./types";

/**
 * Reads BPM and initial-key tags already embedded in the audio file.
 * Camelot-style key tags ("8A") are dropped, since they don't parse as a note.
 */
export class EmbeddedTagAnalyzer implements LocalAnalyzer {
  readonly name = "Embedded tags";

  isAvailable(): boolean {
    return true;
  }

  async analyze(audio: AudioHandle): Promise<RawMetadata> {
    if (!audio || !presentOrUndefined(audio.path)) {
      throw new TrackInfoUsageError("Local analysis requires an audio handle with a file path");
    }
    if (!fs.existsSync(audio.path)) {
      throw new Error(`Audio file not found: ${audio.path}`);
    }

    const metadata = await parseFile(audio.path, { duration: false, skipCovers: true });
    const { bpm, key } = metadata.common;

    const result: RawMetadata = {};
    if (typeof bpm === "number" && Number.isFinite(bpm) && bpm > 0) {
      result.bpm = String(Math.round(bpm));
    }
    const tagKey = presentOrUndefined(key);
    if (tagKey !== undefined && normalizeKey(tagKey)) {
      result.key = tagKey;
    }
    return result;
  }
}
