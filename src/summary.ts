import * as fs from "fs";
import { colors } from "./logger";
import { ResolvedTrackInfo, TrackSummary } from "./types";

export function verifySearchUrl(title: string): string {
  const params = new URLSearchParams({ q: `${title} bpm key` });
  return `https://www.google.com/search?${params.toString()}`;
}

function timestamp(now: Date): string {
  return now.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function renderTrackInfoMarkdown(summary: TrackSummary, now: Date = new Date()): string {
  const { title, url, wavBasename, info } = summary;
  const lines = [
    `# ${title}`,
    "",
    `- URL: ${url}`,
    `- Downloaded WAV: ${wavBasename}`,
    `- Detected BPM: ${info.bpm ?? "Unknown"}`,
    `- Detected Key: ${info.key ?? "Unknown"}`,
  ];

  if (info.camelot) {
    lines.push(`- Camelot: ${info.camelot}`);
  }
  if (info.sources.length > 0) {
    lines.push("- Detection Method:");
    for (const source of info.sources) {
      lines.push(`  - ${source}`);
    }
  }

  lines.push("", `- Verify at: ${verifySearchUrl(title)}`, "", `_Generated: ${timestamp(now)}_`, "");
  return lines.join("\n");
}

export function writeTrackInfoMarkdown(mdPath: string, summary: TrackSummary): void {
  fs.writeFileSync(mdPath, renderTrackInfoMarkdown(summary), "utf-8");
}

/** Plain-text block for the terminal; colors are applied by printTrackSummary. */
export function formatTrackSummary(title: string, info: ResolvedTrackInfo): string[] {
  const lines = [
    `Song:     ${title}`,
    `BPM:      ${info.bpm ?? "Unknown"}`,
    `Key:      ${info.key ?? "Unknown"}`,
  ];
  if (info.camelot) {
    lines.push(`Camelot:  ${info.camelot}`);
  }
  if (info.sources.length > 0) {
    lines.push(`Source:   ${info.sources.join(", ")}`);
  }
  return lines;
}

export function printTrackSummary(title: string, info: ResolvedTrackInfo, targetDir: string): void {
  const rule = `${colors.bright}${colors.cyan}${"=".repeat(60)}${colors.reset}`;
  console.log("\n" + rule);
  console.log(`${colors.bright}🎵  TRACK INFORMATION${colors.reset}`);
  console.log(rule);
  for (const line of formatTrackSummary(title, info)) {
    console.log(line);
  }
  console.log(rule);
  console.log(`\n${colors.green}✓ Done! Files saved to:${colors.reset}\n  ${targetDir}\n`);
}
