import { FilterField, FilterPredicate, MediaRecord } from "@media-inspector/core";

export function matchesPredicate(record: MediaRecord, predicate: FilterPredicate): boolean {
  return record[predicate.field].includes(predicate.value);
}

/**
 * Catalogue-order subsequence of the records that satisfy every predicate.
 * Matching is by substring, so "192" selects "1920x1080".
 */
export function filterView(
  records: ReadonlyArray<MediaRecord>,
  predicates: ReadonlyArray<FilterPredicate>
): MediaRecord[] {
  if (predicates.length === 0) {
    return [...records];
  }
  return records.filter((record) =>
    predicates.every((predicate) => matchesPredicate(record, predicate))
  );
}

export class FilterSet {
  private predicates: FilterPredicate[] = [];

  add(predicate: FilterPredicate): void {
    this.predicates.push({ field: predicate.field, value: predicate.value });
  }

  /** Replaces every predicate on `field`; `undefined` just removes them. */
  setForField(field: FilterField, value: string | undefined): void {
    this.predicates = this.predicates.filter((predicate) => predicate.field !== field);
    if (value !== undefined) {
      this.predicates.push({ field, value });
    }
  }

  valueFor(field: FilterField): string | undefined {
    return this.predicates.find((predicate) => predicate.field === field)?.value;
  }

  clear(): void {
    this.predicates = [];
  }

  list(): ReadonlyArray<FilterPredicate> {
    return this.predicates;
  }

  get size(): number {
    return this.predicates.length;
  }
}
