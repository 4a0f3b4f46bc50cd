#!/usr/bin/env node

import * as path from "path";
import { loadConfig } from "./config";
import { errorMessage } from "./errors";
import { colorLog } from "./logger";
import { sanitizeFilename } from "./sanitize";
import { createResolver } from "./sources";
import { DemucsSeparator } from "./stem-splitter";
import { isCommandAvailable } from "./subprocess";
import { printTrackSummary, verifySearchUrl, writeTrackInfoMarkdown } from "./summary";
import { YtDlpFetcher } from "./youtube-fetcher";

async function main() {
  const args = process.argv.slice(2);
  if (args.length < 1 || args.length > 3) {
    console.log("Usage: track-info <youtube_url> [bpm] [key]");
    console.log("Example: track-info 'https://youtube.com/...' 99 'G Major'");
    process.exit(1);
  }

  const [url, manualBpm, manualKey] = args;
  const config = loadConfig();

  if (!(await isCommandAvailable(config.ytDlpBin))) {
    colorLog.error(`Required dependency '${config.ytDlpBin}' not found in PATH.`);
    process.exit(1);
  }

  const fetcher = new YtDlpFetcher(config.ytDlpBin);

  let title: string;
  try {
    title = await fetcher.getTitle(url);
  } catch (error) {
    colorLog.error(`Failed to fetch video title: ${errorMessage(error)}`);
    process.exit(1);
  }

  const safeTitle = sanitizeFilename(title);
  const targetDir = path.join(config.outputDir, safeTitle);

  colorLog.processing(`Downloading audio to '${targetDir}'...`);
  let wavPath: string;
  try {
    wavPath = await fetcher.downloadAudio(url, targetDir, "wav");
  } catch (error) {
    colorLog.error(`Failed to download audio: ${errorMessage(error)}`);
    process.exit(1);
  }

  const separator = new DemucsSeparator(config.demucsBin);
  if (await separator.isAvailable()) {
    colorLog.processing("Splitting stems...");
    try {
      const { stemPath, instrumentalPath } = await separator.split(wavPath);
      colorLog.success(`Vocals saved to ${stemPath}`);
      colorLog.success(`Instrumental saved to ${instrumentalPath}`);
    } catch (error) {
      colorLog.warning(`Stem split failed: ${errorMessage(error)}`);
    }
  } else {
    colorLog.warning(`'${config.demucsBin}' not found. Skipping stem split.`);
  }

  const resolver = createResolver(config, colorLog);
  const info = await resolver.resolve({
    title,
    audio: { path: wavPath },
    manual: { bpm: manualBpm, key: manualKey },
  });

  colorLog.dim(`🔍 Verify BPM/Key: ${verifySearchUrl(title)}`);

  const mdPath = path.join(targetDir, `${safeTitle}.md`);
  writeTrackInfoMarkdown(mdPath, {
    title,
    url,
    wavBasename: path.basename(wavPath),
    info,
  });

  printTrackSummary(title, info, targetDir);
}

if (require.main === module) {
  main().catch((error) => {
    colorLog.error(`Unhandled error: ${errorMessage(error)}`);
    process.exit(1);
  });
}
