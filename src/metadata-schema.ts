import { z } from "zod";
import { presentOrUndefined } from "./normalize";
import { RawMetadata } from "./types";

// Nullable rather than optional: structured outputs require every key to be present
export const TrackMetadataSchema = z.object({
  bpm: z.string().nullable(),
  key: z.string().nullable(),
  camelot: z.string().nullable(),
});

export type TrackMetadataReply = z.infer<typeof TrackMetadataSchema>;

export function toRawMetadata(reply: TrackMetadataReply): RawMetadata {
  return {
    bpm: presentOrUndefined(reply.bpm),
    key: presentOrUndefined(reply.key),
    camelot: presentOrUndefined(reply.camelot),
  };
}

export function buildLookupPrompt(title: string): string {
  return `You are a DJ's research assistant. Find the tempo and musical key of this track using a web search.

<track>
${title}
</track>

Prefer dedicated BPM/key databases (TuneBat, SongBPM, Beatport) over guesses.

Return a JSON object with exactly these keys:
- "bpm": tempo as a whole number string, e.g. "128", or null if unknown
- "key": key as note and mode, e.g. "A Minor" or "F# Major", or null if unknown
- "camelot": Camelot wheel code, e.g. "8A", or null if unknown

Do not include any text outside the JSON object.`;
}
