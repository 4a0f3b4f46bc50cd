import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const { runCommandMock, isCommandAvailableMock } = vi.hoisted(() => ({
  runCommandMock: vi.fn(),
  isCommandAvailableMock: vi.fn(),
}));

vi.mock("../src/subprocess", () => ({
  runCommand: runCommandMock,
  isCommandAvailable: isCommandAvailableMock,
}));

import { DemucsSeparator } from "../src/stem-splitter";

describe("DemucsSeparator", () => {
  let tmpDir: string;
  let inputPath: string;

  beforeEach(() => {
    runCommandMock.mockReset();
    isCommandAvailableMock.mockReset();
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "track-info-stems-"));
    inputPath = path.join(tmpDir, "song.wav");
    fs.writeFileSync(inputPath, "mix");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function demucsWrites(stem: string) {
    runCommandMock.mockImplementationOnce(async (_cmd: string, args: string[]) => {
      const outputDir = args[args.indexOf("-o") + 1];
      const folder = path.join(outputDir, "htdemucs", "song");
      fs.mkdirSync(folder, { recursive: true });
      fs.writeFileSync(path.join(folder, `${stem}.wav`), "stem");
      fs.writeFileSync(path.join(folder, `no_${stem}.wav`), "rest");
    });
  }

  it("splits vocals and copies the stems next to the input", async () => {
    demucsWrites("vocals");
    const outputDir = path.join(tmpDir, "demucs_output");

    const result = await new DemucsSeparator().split(inputPath);

    expect(runCommandMock).toHaveBeenCalledWith("demucs", [
      "--two-stems",
      "vocals",
      "-o",
      outputDir,
      inputPath,
    ]);
    expect(result).toEqual({
      stemPath: path.join(tmpDir, "song_vocals.wav"),
      instrumentalPath: path.join(tmpDir, "song_instrumental.wav"),
    });
    expect(fs.readFileSync(result.stemPath, "utf-8")).toBe("stem");
    expect(fs.readFileSync(result.instrumentalPath, "utf-8")).toBe("rest");
  });

  it("clears a previous output directory", async () => {
    const outputDir = path.join(tmpDir, "out");
    fs.mkdirSync(outputDir);
    fs.writeFileSync(path.join(outputDir, "stale.txt"), "old");
    demucsWrites("drums");

    await new DemucsSeparator("demucs").split(inputPath, { outputDir, stem: "drums" });

    expect(fs.existsSync(path.join(outputDir, "stale.txt"))).toBe(false);
    expect(fs.existsSync(path.join(tmpDir, "song_drums.wav"))).toBe(true);
  });

  it("leaves out --two-stems for a full split", async () => {
    demucsWrites("vocals");
    const outputDir = path.join(tmpDir, "out");

    await new DemucsSeparator().split(inputPath, { outputDir, twoStems: false });

    expect(runCommandMock).toHaveBeenCalledWith("demucs", ["-o", outputDir, inputPath]);
  });

  it("fails when demucs produced no stem", async () => {
    runCommandMock.mockResolvedValueOnce(undefined);
    const outputDir = path.join(tmpDir, "out");

    await expect(new DemucsSeparator().split(inputPath, { outputDir })).rejects.toThrow(
      `Expected vocals file not found: ${path.join(outputDir, "htdemucs", "song", "vocals.wav")}`
    );
  });

  it("probes the configured binary with --help", async () => {
    isCommandAvailableMock.mockResolvedValueOnce(false);

    await expect(new DemucsSeparator("/opt/demucs").isAvailable()).resolves.toBe(false);
    expect(isCommandAvailableMock).toHaveBeenCalledWith("/opt/demucs", ["--help"]);
  });
});
