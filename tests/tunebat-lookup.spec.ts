import { describe, expect, it, vi } from "vitest";
import { TunebatLookup, buildTunebatSearchUrl, labelsToMetadata } from "../src/tunebat-lookup";
import { PageScraper } from "../src/types";

function fakeScraper(available: boolean, labels: Record<string, string> = {}) {
  const scraper: PageScraper = {
    isAvailable: () => available,
    scrapeLabels: vi.fn(async (_url: string) => labels),
  };
  return scraper;
}

describe("buildTunebatSearchUrl", () => {
  it("encodes the title into the search query", () => {
    expect(buildTunebatSearchUrl("Daft Punk - One More Time")).toBe(
      "https://tunebat.com/Search?q=Daft%20Punk%20-%20One%20More%20Time"
    );
  });
});

describe("labelsToMetadata", () => {
  it("maps labels case-insensitively and ignores unknown ones", () => {
    expect(labelsToMetadata({ BPM: "128", Key: "A Minor", camelot: " 8A ", Energy: "7" })).toEqual({
      bpm: "128",
      key: "A Minor",
      camelot: "8A",
    });
  });

  it("drops blank values", () => {
    expect(labelsToMetadata({ BPM: "", key: "  " })).toEqual({});
  });

  it("ignores labels that only exist on Object.prototype", () => {
    expect(labelsToMetadata({ constructor: "x", toString: "y" })).toEqual({});
  });
});

describe("TunebatLookup", () => {
  it("is unavailable without a scraper", async () => {
    const lookup = new TunebatLookup();

    expect(lookup.isAvailable()).toBe(false);
    await expect(lookup.query("Some Track")).rejects.toThrow("TuneBat lookup needs a page scraper");
  });

  it("follows the scraper's availability", () => {
    expect(new TunebatLookup(fakeScraper(false)).isAvailable()).toBe(false);
    expect(new TunebatLookup(fakeScraper(true)).isAvailable()).toBe(true);
  });

  it("queries the search page and maps the labels", async () => {
    const scraper = fakeScraper(true, { BPM: "97", key: "G# Minor", camelot: "1A" });
    const lookup = new TunebatLookup(scraper);

    const metadata = await lookup.query("Some Track");

    expect(scraper.scrapeLabels).toHaveBeenCalledWith("https://tunebat.com/Search?q=Some%20Track");
    expect(metadata).toEqual({ bpm: "97", key: "G# Minor", camelot: "1A" });
  });
});
