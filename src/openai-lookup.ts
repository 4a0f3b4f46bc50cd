import OpenAI from "openai";
import { zodTextFormat } from "openai/helpers/zod";
import { TrackMetadataSchema, buildLookupPrompt, toRawMetadata } from "./metadata-schema";
import { LookupSource, RawMetadata } from "./types";

export class OpenAILookup implements LookupSource {
  readonly name = "OpenAI";
  private openai?: OpenAI;
  private model: string;

  constructor(apiKey?: string, model: string = "o3") {
    if (apiKey) {
      this.openai = new OpenAI({ apiKey });
    }
    this.model = model;
  }

  isAvailable(): boolean {
    return this.openai !== undefined;
  }

  async query(title: string): Promise<RawMetadata> {
    if (!this.openai) {
      throw new Error("OpenAI API key is required. Set OPENAI_API_KEY environment variable");
    }

    const response = await this.openai.responses.create({
      model: this.model,
      input: [
        {
          role: "user",
          content: buildLookupPrompt(title),
        },
      ],
      reasoning: {
        effort: "medium",
      },
      tools: [
        {
          type: "web_search_preview",
        },
      ],
      text: {
        format: zodTextFormat(TrackMetadataSchema, "track_metadata"),
      },
      store: false, // Zero Data Retention
    });

    if (response.status !== "completed") {
      throw new Error(`OpenAI request failed with status: ${response.status}`);
    }

    if (!response.output_text) {
      throw new Error("No output text in OpenAI response");
    }

    const parsed: unknown = JSON.parse(response.output_text);
    return toRawMetadata(TrackMetadataSchema.parse(parsed));
  }
}
