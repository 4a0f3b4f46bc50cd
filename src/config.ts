import dotenv from "dotenv";
import { z } from "zod";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const ConfigSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().min(1).default("o3"),
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: z.string().min(1).default("claude-opus-4-20250514"),
  TRACK_INFO_LOOKUP: z.enum(["openai", "anthropic", "none"]).default("openai"),
  TRACK_INFO_OUTPUT_DIR: optionalString,
  YTDLP_BIN: z.string().min(1).default("yt-dlp"),
  DEMUCS_BIN: z.string().min(1).default("demucs"),
  BPM_TOLERANCE: z.coerce.number().int().min(0).default(2),
});

export type LookupProvider = z.infer<typeof ConfigSchema>["TRACK_INFO_LOOKUP"];

export interface TrackInfoConfig {
  openaiApiKey?: string;
  openaiModel: string;
  anthropicApiKey?: string;
  anthropicModel: string;
  lookupProvider: LookupProvider;
  outputDir: string;
  ytDlpBin: string;
  demucsBin: string;
  bpmTolerance: number;
}

/**
 * Reads settings from `env` (process.env after .env is loaded, by default).
 * Empty strings count as unset so a blank line in .env falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = loadDotenv()): TrackInfoConfig {
  const cleaned: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") {
      cleaned[name] = value;
    }
  }

  const parsed = ConfigSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    openaiApiKey: values.OPENAI_API_KEY,
    openaiModel: values.OPENAI_MODEL,
    anthropicApiKey: values.ANTHROPIC_API_KEY,
    anthropicModel: values.ANTHROPIC_MODEL,
    lookupProvider: values.TRACK_INFO_LOOKUP,
    outputDir: values.TRACK_INFO_OUTPUT_DIR ?? process.cwd(),
    ytDlpBin: values.YTDLP_BIN,
    demucsBin: values.DEMUCS_BIN,
    bpmTolerance: values.BPM_TOLERANCE,
  };
}

function loadDotenv(): NodeJS.ProcessEnv {
  dotenv.config();
  return process.env;
}
