import { describe, expect, it } from "vitest";
import { TrackInfoUsageError } from "../src/errors";
import { parseVerifyArgs, verifyTrackInfo } from "../src/verify-metadata";
import { ResolvedTrackInfo } from "../src/types";

function info(fields: Partial<ResolvedTrackInfo>): ResolvedTrackInfo {
  return { bpm: undefined, key: undefined, camelot: undefined, sources: ["lookup"], ...fields };
}

describe("parseVerifyArgs", () => {
  it("reads title, BPM and key", () => {
    expect(parseVerifyArgs(["Some Track", "99", "G Major"])).toEqual({
      title: "Some Track",
      expectedBpm: 99,
      expectedKey: "G Major",
      audio: undefined,
      tolerance: undefined,
    });
  });

  it("reads --audio and --tolerance anywhere", () => {
    expect(
      parseVerifyArgs(["--audio", "/tmp/a.wav", "Some Track", "97", "G#min", "--tolerance", "3"])
    ).toEqual({
      title: "Some Track",
      expectedBpm: 97,
      expectedKey: "G#min",
      audio: { path: "/tmp/a.wav" },
      tolerance: 3,
    });
  });

  it("rejects a non-numeric BPM", () => {
    expect(() => parseVerifyArgs(["Some Track", "fast", "G"])).toThrow(
      "expectedBpm must be a whole number, got 'fast'"
    );
  });

  it("rejects missing arguments", () => {
    expect(() => parseVerifyArgs(["Some Track"])).toThrow(TrackInfoUsageError);
    expect(() => parseVerifyArgs(["Some Track", "99", "G", "--tolerance"])).toThrow(
      "--tolerance must be a whole number, got ''"
    );
    expect(() => parseVerifyArgs(["Some Track", "99", "G", "--audio"])).toThrow(
      "--audio needs a file path"
    );
  });
});

describe("verifyTrackInfo", () => {
  it("passes when BPM is in tolerance and the key is enharmonic", () => {
    expect(verifyTrackInfo(info({ bpm: "97", key: "Ab Minor" }), 99, "G# min", 2)).toEqual({
      bpmMatch: true,
      keyMatch: true,
      passed: true,
    });
  });

  it("fails on a BPM outside tolerance", () => {
    expect(verifyTrackInfo(info({ bpm: "95" }), 99, "G Major", 2)).toEqual({
      bpmMatch: false,
      keyMatch: undefined,
      passed: false,
    });
  });

  it("passes on the fields that resolved", () => {
    expect(verifyTrackInfo(info({ key: "G major" }), 99, "G Major", 2).passed).toBe(true);
  });

  it("fails when nothing resolved", () => {
    expect(verifyTrackInfo(info({}), 99, "G Major", 2).passed).toBe(false);
  });

  it("fails on a mode mismatch", () => {
    expect(verifyTrackInfo(info({ bpm: "99", key: "G Minor" }), 99, "G Major", 0)).toEqual({
      bpmMatch: true,
      keyMatch: false,
      passed: false,
    });
  });
});
