import { AnthropicLookup } from "./anthropic-lookup";
import { TrackInfoConfig } from "./config";
import { EmbeddedTagAnalyzer } from "./embedded-tag-analyzer";
import { Logger } from "./logger";
import { OpenAILookup } from "./openai-lookup";
import { ResolverOptions, TrackMetadataResolver } from "./resolver";
import { LookupSource } from "./types";

export function createLookup(config: TrackInfoConfig): LookupSource | undefined {
  switch (config.lookupProvider) {
    case "openai":
      return new OpenAILookup(config.openaiApiKey, config.openaiModel);
    case "anthropic":
      return new AnthropicLookup(config.anthropicApiKey, config.anthropicModel);
    case "none":
      return undefined;
  }
}

export function createResolver(
  config: TrackInfoConfig,
  logger?: Logger,
  overrides: ResolverOptions = {}
): TrackMetadataResolver {
  return new TrackMetadataResolver({
    lookup: createLookup(config),
    analyzer: new EmbeddedTagAnalyzer(),
    logger,
    ...overrides,
  });
}
