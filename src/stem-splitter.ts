import * as fs from "fs";
import * as path from "path";
import { isCommandAvailable, runCommand } from "./subprocess";
import { StemSeparator, StemSplitOptions, StemSplitResult } from "./types";

export class DemucsSeparator implements StemSeparator {
  private bin: string;

  constructor(bin: string = "demucs") {
    this.bin = bin;
  }

  isAvailable(): Promise<boolean> {
    // demucs has no --version flag and exits 2 without a track argument
    return isCommandAvailable(this.bin, ["--help"]);
  }

  /**
   * Two-stem split by default (`stem` + everything else). Copies the results
   * next to the input as <name>_<stem>.wav and <name>_instrumental.wav.
   */
  async split(inputPath: string, options: StemSplitOptions = {}): Promise<StemSplitResult> {
    const { twoStems = true, stem = "vocals" } = options;
    const inputDir = path.dirname(inputPath);
    const basename = path.basename(inputPath, path.extname(inputPath));
    const outputDir = options.outputDir ?? path.join(inputDir, "demucs_output");

    fs.rmSync(outputDir, { recursive: true, force: true });
    fs.mkdirSync(outputDir, { recursive: true });

    const args: string[] = [];
    if (twoStems) {
      args.push("--two-stems", stem);
    }
    args.push("-o", outputDir, inputPath);
    await runCommand(this.bin, args);

    const stemFolder = path.join(outputDir, "htdemucs", basename);
    const separatedStem = path.join(stemFolder, `${stem}.wav`);
    const separatedRest = path.join(stemFolder, `no_${stem}.wav`);

    if (!fs.existsSync(separatedStem)) {
      throw new Error(`Expected ${stem} file not found: ${separatedStem}`);
    }
    if (!fs.existsSync(separatedRest)) {
      throw new Error(`Expected instrumental file not found: ${separatedRest}`);
    }

    const stemPath = path.join(inputDir, `${basename}_${stem}.wav`);
    const instrumentalPath = path.join(inputDir, `${basename}_instrumental.wav`);
    fs.copyFileSync(separatedStem, stemPath);
    fs.copyFileSync(separatedRest, instrumentalPath);

    return { stemPath, instrumentalPath };
  }
}
