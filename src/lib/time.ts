import type { RawBanRecord } from "../types"

const MINUTE_MS = 60_000

export function effectiveTimestamp(record: Pick<RawBanRecord, "startTime" | "createTime">): string | null {
  return record.startTime || record.createTime || null
}

/** Epoch millis of the effective timestamp; missing or unparsable values sort as the oldest. */
export function effectiveTime(record: Pick<RawBanRecord, "startTime" | "createTime">): number {
  const iso = effectiveTimestamp(record)
  if (!iso) {
    return Number.NEGATIVE_INFINITY
  }

  const parsed = Date.parse(iso)
  return Number.isNaN(parsed) ? Number.NEGATIVE_INFINITY : parsed
}

export function formatRelativeTime(iso: string | null, now: number): string {
  if (!iso) {
    return ""
  }

  const diff = now - Date.parse(iso)
  if (!Number.isFinite(diff)) {
    return ""
  }

  const minutes = Math.floor(diff / MINUTE_MS)
  if (minutes < 1) {
    return "just now"
  }
  if (minutes < 60) {
    return `${minutes}m ago`
  }

  const hours = Math.floor(minutes / 60)
  if (hours < 24) {
    return `${hours}h ago`
  }

  return `${Math.floor(hours / 24)}d ago`
}

export function formatAbsoluteTime(iso: string | null, timeZone?: string): string {
  if (!iso) {
    return "Unknown"
  }

  const date = new Date(iso)
  if (Number.isNaN(date.getTime())) {
    return "Unknown"
  }

  return date.toLocaleString(undefined, {
    month: "short",
    day: "numeric",
    hour: "2-digit",
    minute: "2-digit",
    timeZone,
  })
}

export function formatCountdown(nextRefreshAt: number | null, now: number): string {
  if (nextRefreshAt === null) {
    return "—"
  }

  const diff = nextRefreshAt - now
  if (diff <= 0) {
    return "now"
  }

  return `${Math.ceil(diff / 1000)}s`
}
