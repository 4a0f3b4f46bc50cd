#!/usr/bin/env node

import { loadConfig } from "./config";
import { TrackInfoUsageError, errorMessage } from "./errors";
import { colorLog, colors } from "./logger";
import { bpmMatches, keyMatches } from "./match";
import { normalizeKey, renderKey } from "./normalize";
import { createResolver } from "./sources";
import { AudioHandle, ResolvedTrackInfo } from "./types";

export interface VerifyArgs {
  title: string;
  expectedBpm: number;
  expectedKey: string;
  audio?: AudioHandle;
  tolerance?: number;
}

export interface VerificationReport {
  bpmMatch: boolean | undefined;
  keyMatch: boolean | undefined;
  passed: boolean;
}

function parseWholeNumber(value: string | undefined, label: string): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new TrackInfoUsageError(`${label} must be a whole number, got '${value ?? ""}'`);
  }
  return parseInt(value, 10);
}

export function parseVerifyArgs(argv: readonly string[]): VerifyArgs {
  const positional: string[] = [];
  let audio: AudioHandle | undefined;
  let tolerance: number | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--audio") {
      const audioPath = argv[++i];
      if (!audioPath) {
        throw new TrackInfoUsageError("--audio needs a file path");
      }
      audio = { path: audioPath };
    } else if (arg === "--tolerance") {
      tolerance = parseWholeNumber(argv[++i], "--tolerance");
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 3) {
    throw new TrackInfoUsageError(
      "Usage: verify-metadata <title> <expectedBpm> <expectedKey> [--audio <path>] [--tolerance <n>]"
    );
  }

  const [title, bpm, expectedKey] = positional;
  return {
    title,
    expectedBpm: parseWholeNumber(bpm, "expectedBpm"),
    expectedKey,
    audio,
    tolerance,
  };
}

/**
 * A field that was not resolved is reported as undefined and does not fail
 * the check on its own; the check fails if nothing resolved at all.
 */
export function verifyTrackInfo(
  info: ResolvedTrackInfo,
  expectedBpm: number,
  expectedKey: string,
  tolerance: number
): VerificationReport {
  const bpmMatch = info.bpm === undefined ? undefined : bpmMatches(info.bpm, expectedBpm, tolerance);
  const keyMatch = info.key === undefined ? undefined : keyMatches(info.key, expectedKey, true);
  const checked = [bpmMatch, keyMatch].filter((value): value is boolean => value !== undefined);

  return {
    bpmMatch,
    keyMatch,
    passed: checked.length > 0 && checked.every(Boolean),
  };
}

function describeMatch(label: string, detected: string | undefined, expected: string, match: boolean | undefined) {
  if (match === undefined) {
    colorLog.warning(`${label}: not detected (expected ${expected})`);
  } else if (match) {
    colorLog.success(`${label}: ${detected} matches ${expected}`);
  } else {
    colorLog.error(`${label}: ${detected} does not match ${expected}`);
  }
}

async function main() {
  const args = parseVerifyArgs(process.argv.slice(2));
  const config = loadConfig();
  const tolerance = args.tolerance ?? config.bpmTolerance;

  const resolver = createResolver(config, colorLog);
  const info = await resolver.resolve({ title: args.title, audio: args.audio });
  const report = verifyTrackInfo(info, args.expectedBpm, args.expectedKey, tolerance);

  const parsedKey = normalizeKey(args.expectedKey);
  const expectedKeyLabel = parsedKey ? renderKey(parsedKey) : args.expectedKey;

  colorLog.header("=".repeat(60));
  colorLog.stats(`VERIFICATION: ${args.title}`);
  colorLog.header("=".repeat(60));
  describeMatch("BPM", info.bpm, `${args.expectedBpm}±${tolerance}`, report.bpmMatch);
  describeMatch("Key", info.key, expectedKeyLabel, report.keyMatch);
  console.log(
    `${colors.blue}Sources:${colors.reset} ${info.sources.length > 0 ? info.sources.join(", ") : "none"}`
  );

  if (!report.passed) {
    process.exit(1);
  }
}

if (require.main === module) {
  main().catch((error) => {
    colorLog.error(errorMessage(error));
    process.exit(1);
  });
}
