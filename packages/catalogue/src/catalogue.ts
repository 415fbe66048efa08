import { MediaRecord } from "@media-inspector/core";
import { FilterSet, filterView } from "./filter";

/**
 * Insertion-ordered list of analyzed files. Records are only ever appended;
 * `clear` drops them together with the active filters.
 */
export class Catalogue {
  private readonly records: MediaRecord[] = [];
  readonly filters = new FilterSet();

  append(record: MediaRecord): void {
    this.records.push(record);
  }

  clear(): void {
    this.records.length = 0;
    this.filters.clear();
  }

  list(): ReadonlyArray<MediaRecord> {
    return this.records;
  }

  view(): MediaRecord[] {
    return filterView(this.records, this.filters.list());
  }

  get size(): number {
    return this.records.length;
  }
}
