import Anthropic from "@anthropic-ai/sdk";
import { TrackMetadataSchema, buildLookupPrompt, toRawMetadata } from "./metadata-schema";
import { LookupSource, RawMetadata } from "./types";

/**
 * Pulls the JSON object out of a model reply, tolerating ```json fences and
 * prose around the object.
 */
export function extractJsonObject(text: string): string {
  let jsonText = text.trim();

  if (jsonText.startsWith("```json")) {
    jsonText = jsonText.replace(/^```json\s*/, "").replace(/\s*```$/, "");
  } else if (jsonText.startsWith("```")) {
    jsonText = jsonText.replace(/^```\s*/, "").replace(/\s*```$/, "");
  }

  const start = jsonText.indexOf("{");
  const end = jsonText.lastIndexOf("}");
  if (start === -1 || end < start) {
    throw new Error(`No JSON object in response: ${text}`);
  }
  return jsonText.slice(start, end + 1);
}

export class AnthropicLookup implements LookupSource {
  readonly name = "Claude";
  private client?: Anthropic;
  private model: string;

  constructor(apiKey?: string, model: string = "claude-opus-4-20250514") {
    if (apiKey) {
      this.client = new Anthropic({ apiKey });
    }
    this.model = model;
  }

  isAvailable(): boolean {
    return this.client !== undefined;
  }

  async query(title: string): Promise<RawMetadata> {
    if (!this.client) {
      throw new Error("Anthropic API key is required. Set ANTHROPIC_API_KEY environment variable");
    }

    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: 2000,
      tools: [
        {
          type: "web_search_20250305",
          name: "web_search",
          max_uses: 5,
        },
      ],
      messages: [
        {
          role: "user",
          content: buildLookupPrompt(title),
        },
      ],
    });

    // Web search replies interleave tool blocks with several text blocks
    const text = response.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("")
      .trim();

    if (!text) {
      throw new Error(
        `No text content found in response. Content blocks: ${response.content
          .map((c) => c.type)
          .join(", ")}`
      );
    }

    const parsed: unknown = JSON.parse(extractJsonObject(text));
    return toRawMetadata(TrackMetadataSchema.parse(parsed));
  }
}
