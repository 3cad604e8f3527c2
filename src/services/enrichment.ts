import { effectiveTime } from "../lib/time"
import type { EnrichedBanRecord, Profile, RawBanRecord, UserId } from "../types"

export interface ProfileSource {
  resolve(userId: UserId | null | undefined): Promise<Profile>
}

/**
 * Attaches a profile to every record and orders the batch newest first.
 * Sorting runs after every lookup has settled, so the order never depends on
 * which lookup finished first.
 */
export async function enrichBanRecords(
  records: readonly RawBanRecord[],
  profiles: ProfileSource,
): Promise<EnrichedBanRecord[]> {
  const enriched = await Promise.all(
    records.map(async (record): Promise<EnrichedBanRecord> => {
      const profile = await profiles.resolve(record.userId)
      return { ...record, profile }
    }),
  )

  return sortByRecency(enriched)
}

export function sortByRecency<T extends RawBanRecord>(records: readonly T[]): T[] {
  return records
    .map((record) => ({ record, time: effectiveTime(record) }))
    .sort((a, b) => {
      if (a.time === b.time) {
        return 0
      }
      return a.time < b.time ? 1 : -1
    })
    .map((entry) => entry.record)
}
