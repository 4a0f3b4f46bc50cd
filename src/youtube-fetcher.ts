import * as fs from "fs";
import * as path from "path";
import { runCommand, runCommandCapture } from "./subprocess";
import { MediaFetcher } from "./types";

export class YtDlpFetcher implements MediaFetcher {
  private bin: string;

  constructor(bin: string = "yt-dlp") {
    this.bin = bin;
  }

  async getTitle(url: string): Promise<string> {
    const { stdout } = await runCommandCapture(this.bin, [
      "--no-playlist",
      "--print",
      "%(title)s",
      url,
    ]);
    const title = stdout.trim();
    if (!title) {
      throw new Error(`yt-dlp returned an empty title for ${url}`);
    }
    return title;
  }

  /** Downloads the audio track and returns the path of the newest matching file in `outputDir`. */
  async downloadAudio(url: string, outputDir: string, audioFormat: string = "wav"): Promise<string> {
    fs.mkdirSync(outputDir, { recursive: true });

    await runCommand(this.bin, [
      "--no-playlist",
      "--extract-audio",
      "--audio-format",
      audioFormat,
      "-o",
      path.join(outputDir, "%(title)s.%(ext)s"),
      url,
    ]);

    const extension = `.${audioFormat.toLowerCase()}`;
    const audioFiles = fs
      .readdirSync(outputDir)
      .filter((file) => file.toLowerCase().endsWith(extension))
      .map((file) => path.join(outputDir, file));

    if (audioFiles.length === 0) {
      throw new Error(
        `No ${audioFormat.toUpperCase()} file found after download in ${outputDir}`
      );
    }

    // yt-dlp may leave earlier downloads in the same folder
    audioFiles.sort((a, b) => fs.statSync(b).mtimeMs - fs.statSync(a).mtimeMs);
    return audioFiles[0];
  }
}
