import { presentOrUndefined } from "./normalize";
import { LookupSource, PageScraper, RawMetadata } from "./types";

export const TUNEBAT_SEARCH_URL = "https://tunebat.com/Search?q=";

const LABEL_FIELDS = new Map<string, keyof RawMetadata>([
  ["bpm", "bpm"],
  ["key", "key"],
  ["camelot", "camelot"],
]);

export function buildTunebatSearchUrl(title: string): string {
  return `${TUNEBAT_SEARCH_URL}${encodeURIComponent(title)}`;
}

/** Maps TuneBat's "BPM" / "key" / "camelot" labels onto metadata fields. */
export function labelsToMetadata(labels: Record<string, string>): RawMetadata {
  const metadata: RawMetadata = {};
  for (const [label, value] of Object.entries(labels)) {
    const field = LABEL_FIELDS.get(label.trim().toLowerCase());
    const present = presentOrUndefined(value);
    if (field && present !== undefined && metadata[field] === undefined) {
      metadata[field] = present;
    }
  }
  return metadata;
}

export class TunebatLookup implements LookupSource {
  readonly name = "TuneBat";
  private scraper?: PageScraper;

  constructor(scraper?: PageScraper) {
    this.scraper = scraper;
  }

  isAvailable(): boolean {
    return this.scraper !== undefined && this.scraper.isAvailable();
  }

  async query(title: string): Promise<RawMetadata> {
    if (!this.scraper) {
      throw new Error("TuneBat lookup needs a page scraper");
    }

    const labels = await this.scraper.scrapeLabels(buildTunebatSearchUrl(title));
    return labelsToMetadata(labels);
  }
}
