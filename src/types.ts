export type Mode = "maj" | "min";

export type SharpNote = "A#" | "C#" | "D#" | "F#" | "G#";
export type FlatNote = "Bb" | "Db" | "Eb" | "Gb" | "Ab";
export type NaturalNote = "A" | "B" | "C" | "D" | "E" | "F" | "G";

// Any leading note token the normalizer accepts, e.g. "Cb" or "E#" as well
export type NoteName = `${NaturalNote}${"" | "#" | "b"}`;

export interface NormalizedKey {
  note: NoteName;
  mode: Mode;
}

export interface RawMetadata {
  bpm?: string;
  key?: string;
  camelot?: string;
}

export type MetadataField = keyof RawMetadata;

export interface ResolvedTrackInfo {
  readonly bpm: string | undefined;
  readonly key: string | undefined;
  readonly camelot: string | undefined;
  readonly sources: readonly string[];
}

export interface AudioHandle {
  path: string;
}

export interface ManualOverride {
  bpm?: string;
  key?: string;
}

export interface ResolveRequest {
  title: string;
  audio?: AudioHandle;
  manual?: ManualOverride;
}

export type ResolverState =
  | "INIT"
  | "SOURCE_A_QUERIED"
  | "SOURCE_B_QUERIED"
  | "MERGED"
  | "DONE";

export interface LookupSource {
  readonly name: string;
  isAvailable(): boolean;
  query(title: string): Promise<RawMetadata>;
}

export interface LocalAnalyzer {
  readonly name: string;
  isAvailable(): boolean;
  analyze(audio: AudioHandle): Promise<RawMetadata>;
}

export interface PageScraper {
  isAvailable(): boolean;
  /** Visible label -> value pairs from the first result page for `searchUrl`. */
  scrapeLabels(searchUrl: string): Promise<Record<string, string>>;
}

export interface MediaFetcher {
  getTitle(url: string): Promise<string>;
  downloadAudio(url: string, outputDir: string, audioFormat?: string): Promise<string>;
}

export interface StemSplitOptions {
  outputDir?: string;
  twoStems?: boolean;
  stem?: string;
}

export interface StemSplitResult {
  stemPath: string;
  instrumentalPath: string;
}

export interface StemSeparator {
  isAvailable(): Promise<boolean>;
  split(inputPath: string, options?: StemSplitOptions): Promise<StemSplitResult>;
}

export interface TrackSummary {
  title: string;
  url: string;
  wavBasename: string;
  info: ResolvedTrackInfo;
}
