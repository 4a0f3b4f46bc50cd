#!/usr/bin/env node

import * as fs from "fs";
import { loadConfig } from "./config";
import { errorMessage } from "./errors";
import { colorLog } from "./logger";
import { DemucsSeparator } from "./stem-splitter";

async function main() {
  const inputPath = process.argv[2];
  if (!inputPath) {
    console.log("Usage: split-stems <audio_file>");
    process.exit(1);
  }
  if (!fs.existsSync(inputPath)) {
    colorLog.error(`File not found: ${inputPath}`);
    process.exit(1);
  }

  const config = loadConfig();
  const separator = new DemucsSeparator(config.demucsBin);
  if (!(await separator.isAvailable())) {
    colorLog.error(`Required dependency '${config.demucsBin}' not found in PATH.`);
    process.exit(1);
  }

  colorLog.processing(`Splitting ${inputPath}...`);
  const { stemPath, instrumentalPath } = await separator.split(inputPath);
  colorLog.success(`Vocals saved to ${stemPath}`);
  colorLog.success(`Instrumental saved to ${instrumentalPath}`);
}

if (require.main === module) {
  main().catch((error) => {
    colorLog.error(`Stem split failed: ${errorMessage(error)}`);
    process.exit(1);
  });
}
