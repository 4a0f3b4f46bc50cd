import { TrackInfoUsageError, errorMessage } from "./errors";
import { Logger, colorLog } from "./logger";
import { presentOrUndefined } from "./normalize";
import { TrackInfoBuilder } from "./track-info-builder";
import {
  AudioHandle,
  LocalAnalyzer,
  LookupSource,
  RawMetadata,
  ResolveRequest,
  ResolvedTrackInfo,
  ResolverState,
} from "./types";

export const MANUAL_SOURCE = "manual";

export interface ResolverOptions {
  lookup?: LookupSource;
  analyzer?: LocalAnalyzer;
  logger?: Logger;
  onStateChange?: (state: ResolverState) => void;
}

/**
 * Resolves BPM/key/Camelot for one track.
 *
 * The lookup source is authoritative. The local analyzer runs only when the
 * lookup left bpm or key empty, and only fills those gaps. Camelot comes from
 * the lookup alone. Manual values skip both sources.
 */
export class TrackMetadataResolver {
  private lookup?: LookupSource;
  private analyzer?: LocalAnalyzer;
  private logger: Logger;
  private onStateChange?: (state: ResolverState) => void;

  constructor(options: ResolverOptions = {}) {
    this.lookup = options.lookup;
    this.analyzer = options.analyzer;
    this.logger = options.logger ?? colorLog;
    this.onStateChange = options.onStateChange;
  }

  async resolve(request: ResolveRequest): Promise<ResolvedTrackInfo> {
    const { title, audio, manual } = request;
    const builder = new TrackInfoBuilder();
    this.transition("INIT");

    if (audio !== undefined && !presentOrUndefined(audio.path)) {
      throw new TrackInfoUsageError("Audio handle was supplied without a file path");
    }

    const manualBpm = presentOrUndefined(manual?.bpm);
    const manualKey = presentOrUndefined(manual?.key);
    if (manualBpm !== undefined || manualKey !== undefined) {
      this.logger.info(
        `Using manually provided BPM/Key: ${manualBpm ?? "Unknown"} BPM, ${manualKey ?? "Unknown"}`
      );
      builder.fill(MANUAL_SOURCE, { bpm: manualBpm, key: manualKey }, ["bpm", "key"]);
      return this.finish(builder);
    }

    if (typeof title !== "string" || !title.trim()) {
      throw new TrackInfoUsageError("A track title is required to resolve metadata");
    }

    await this.queryLookup(builder, title);
    this.transition("SOURCE_A_QUERIED");

    if (!builder.has("bpm") || !builder.has("key")) {
      const analyzed = await this.queryAnalyzer(builder, audio);
      if (analyzed) {
        this.transition("SOURCE_B_QUERIED");
      }
    }

    return this.finish(builder);
  }

  private async queryLookup(builder: TrackInfoBuilder, title: string): Promise<void> {
    const lookup = this.lookup;
    if (!lookup) {
      return;
    }
    if (!this.probe(lookup)) {
      this.logger.warning(`${lookup.name} lookup not available`);
      return;
    }

    this.logger.processing(`Searching ${lookup.name} for "${title}"...`);
    const raw = await this.absorbFailure(lookup.name, () => lookup.query(title));
    const written = builder.fill(lookup.name, raw);

    if (written.length > 0) {
      this.logger.success(`Retrieved from ${lookup.name}: ${describe(raw)}`);
    } else {
      this.logger.warning(`${lookup.name} returned no BPM/Key`);
    }
  }

  /** Returns true when the analyzer was actually called. */
  private async queryAnalyzer(
    builder: TrackInfoBuilder,
    audio: AudioHandle | undefined
  ): Promise<boolean> {
    const analyzer = this.analyzer;
    if (!analyzer) {
      return false;
    }
    if (!this.probe(analyzer)) {
      this.logger.warning(`${analyzer.name} not available for audio analysis`);
      return false;
    }
    if (!audio) {
      this.logger.dim(`No audio supplied, skipping ${analyzer.name}`);
      return false;
    }

    this.logger.music(`Analyzing audio file for BPM/Key (${analyzer.name})...`);
    const raw = await this.absorbFailure(analyzer.name, () => analyzer.analyze(audio));
    const written = builder.fill(analyzer.name, raw, ["bpm", "key"]);
    if (written.length > 0) {
      this.logger.success(`${analyzer.name} filled: ${written.join(", ")}`);
    }
    return true;
  }

  /** A capability check that throws counts as "unavailable". */
  private probe(source: LookupSource | LocalAnalyzer): boolean {
    try {
      return source.isAvailable();
    } catch (error) {
      if (error instanceof TrackInfoUsageError) {
        throw error;
      }
      this.logger.warning(`${source.name} availability check failed: ${errorMessage(error)}`);
      return false;
    }
  }

  private async absorbFailure(
    source: string,
    call: () => Promise<RawMetadata>
  ): Promise<RawMetadata> {
    try {
      // Plain-JS collaborators may resolve null despite the contract
      const raw: RawMetadata | null | undefined = await call();
      return raw ?? {};
    } catch (error) {
      if (error instanceof TrackInfoUsageError) {
        throw error;
      }
      this.logger.warning(`${source} failed: ${errorMessage(error)}`);
      return {};
    }
  }

  private finish(builder: TrackInfoBuilder): ResolvedTrackInfo {
    this.transition("MERGED");
    const info = builder.build();
    this.transition("DONE");
    return info;
  }

  private transition(state: ResolverState): void {
    this.onStateChange?.(state);
  }
}

function describe(raw: RawMetadata): string {
  return `BPM=${raw.bpm ?? "None"}, Key=${raw.key ?? "None"}, Camelot=${raw.camelot ?? "None"}`;
}
