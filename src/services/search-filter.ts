import type { EnrichedBanRecord } from "../types"

function searchHaystack(record: EnrichedBanRecord): string {
  return [
    record.profile.displayName,
    record.profile.username,
    record.userId,
    record.moderatorId,
    record.shortReason,
    record.displayReason,
    record.privateReason,
  ]
    .filter((value) => value !== null && value !== undefined && value !== "")
    .map(String)
    .join(" ")
    .toLowerCase()
}

export function normalizeQuery(query: string): string {
  return query.trim().toLowerCase()
}

/**
 * Case-insensitive substring filter over names, ids and reasons. Keeps input
 * order; a blank query returns `records` itself.
 */
export function filterBanRecords<T extends EnrichedBanRecord>(records: readonly T[], query: string): readonly T[] {
  const needle = normalizeQuery(query)
  if (!needle) {
    return records
  }

  return records.filter((record) => searchHaystack(record).includes(needle))
}
