export * from "./types";
export { normalizeBpm, normalizeKey, renderKey } from "./normalize";
export { ENHARMONIC_MAP, bpmMatches, enharmonicOf, keyMatches } from "./match";
export { TrackInfoBuilder } from "./track-info-builder";
export { MANUAL_SOURCE, TrackMetadataResolver } from "./resolver";
export type { ResolverOptions } from "./resolver";
export { TrackInfoUsageError, CommandFailedError } from "./errors";
export { TunebatLookup, buildTunebatSearchUrl, labelsToMetadata } from "./tunebat-lookup";
export { OpenAILookup } from "./openai-lookup";
export { AnthropicLookup } from "./anthropic-lookup";
export { EmbeddedTagAnalyzer } from "./embedded-tag-analyzer";
export { YtDlpFetcher } from "./youtube-fetcher";
export { DemucsSeparator } from "./stem-splitter";
export { sanitizeFilename } from "./sanitize";
export { renderTrackInfoMarkdown, writeTrackInfoMarkdown, formatTrackSummary } from "./summary";
export { loadConfig } from "./config";
export type { TrackInfoConfig } from "./config";
export { createLookup, createResolver } from "./sources";
