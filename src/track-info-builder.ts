import { presentOrUndefined } from "./normalize";
import { MetadataField, RawMetadata, ResolvedTrackInfo } from "./types";

const ALL_FIELDS: readonly MetadataField[] = ["bpm", "key", "camelot"];

/**
 * Accumulates fields from successive sources. A field is only ever written
 * once, and a source is recorded once, the first time it fills something.
 */
export class TrackInfoBuilder {
  private fields: RawMetadata = {};
  private sources: string[] = [];
  private built = false;

  has(field: MetadataField): boolean {
    return this.fields[field] !== undefined;
  }

  /** Fills every absent field in `fields` that `raw` has a value for. Returns the fields written. */
  fill(
    source: string,
    raw: RawMetadata,
    fields: readonly MetadataField[] = ALL_FIELDS
  ): MetadataField[] {
    this.assertOpen();

    const written: MetadataField[] = [];
    for (const field of fields) {
      const value = presentOrUndefined(raw[field]);
      if (value !== undefined && !this.has(field)) {
        this.fields[field] = value;
        written.push(field);
      }
    }

    if (written.length > 0 && !this.sources.includes(source)) {
      this.sources.push(source);
    }
    return written;
  }

  build(): ResolvedTrackInfo {
    this.assertOpen();
    this.built = true;

    return Object.freeze({
      bpm: this.fields.bpm,
      key: this.fields.key,
      camelot: this.fields.camelot,
      sources: Object.freeze([...this.sources]),
    });
  }

  private assertOpen(): void {
    if (this.built) {
      throw new Error("TrackInfoBuilder already built; start a new builder per resolution");
    }
  }
}
