import { FilterField, MediaRecord } from "@media-inspector/core";

export interface ValueCount {
  value: string;
  count: number;
}

export function countByField(records: ReadonlyArray<MediaRecord>, field: FilterField): ValueCount[] {
  const counts = new Map<string, number>();
  for (const record of records) {
    counts.set(record[field], (counts.get(record[field]) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([value, count]) => ({ value, count }))
    .sort((a, b) => b.count - a.count || (a.value < b.value ? -1 : a.value > b.value ? 1 : 0));
}
