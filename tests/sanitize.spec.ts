import { describe, expect, it } from "vitest";
import { FALLBACK_FILENAME, sanitizeFilename } from "../src/sanitize";

describe("sanitizeFilename", () => {
  it("drops punctuation and collapses whitespace", () => {
    expect(sanitizeFilename("Song Title  (feat. Artist)")).toBe("Song Title (feat Artist)");
  });

  it("removes path separators and brackets", () => {
    expect(sanitizeFilename("AC/DC - Back in Black [Official Video]")).toBe(
      "ACDC - Back in Black Official Video"
    );
  });

  it("keeps accented letters", () => {
    expect(sanitizeFilename("Beyoncé – Halo")).toBe("Beyoncé Halo");
  });

  it("turns tabs and newlines into single spaces", () => {
    expect(sanitizeFilename("  a\tb\nc  ")).toBe("a b c");
  });

  it("falls back when nothing is left", () => {
    expect(sanitizeFilename("???")).toBe(FALLBACK_FILENAME);
    expect(sanitizeFilename("")).toBe("yt_download");
  });
});
