import { AVATAR_PLACEHOLDER } from "../lib/avatar-placeholder";
import { effectiveTimestamp, formatAbsoluteTime, formatRelativeTime } from "../lib/time";
import type { EnrichedBanRecord, UserId } from "../types";

export type BanStatusLabel = "Active" | "Ended";

export interface BanCardView {
  key: string;
  active: boolean;
  statusLabel: BanStatusLabel;
  name: string;
  username: string;
  userIdLabel: string;
  avatarUrl: string;
  reasonLabel: string;
  reasonSlug: string;
  moderatorLabel: string;
  startedLabel: string;
  relativeLabel: string;
  reasonLines: string[];
  reasonTitle: string;
  altAccountsLabel: string;
  referenceLabel: string;
}

export interface BanCounts {
  active: number;
  total: number;
}

export interface BanListView {
  cards: BanCardView[];
  counts: BanCounts;
  empty: boolean;
}

export interface RenderOptions {
  now: number;
  timeZone?: string;
}

export function statusLabel(active: boolean): BanStatusLabel {
  return active ? "Active" : "Ended";
}

export function reasonSlug(shortReason: string | null | undefined): string {
  const slug = (shortReason ?? "").trim().toLowerCase().replace(/\s+/g, "-");
  return slug || "other";
}

export function reasonLines(text: string | null | undefined): string[] {
  const trimmed = (text ?? "").trim();
  if (!trimmed) {
    return ["No public reason provided."];
  }
  return trimmed.split(/\n+/);
}

function idText(value: UserId | null | undefined): string {
  return value === null || value === undefined ? "" : String(value);
}

export function countBans(records: readonly Pick<EnrichedBanRecord, "active">[]): BanCounts {
  return {
    active: records.filter((record) => record.active).length,
    total: records.length,
  };
}

export function toBanCardView(record: EnrichedBanRecord, index: number, options: RenderOptions): BanCardView {
  const userId = idText(record.userId);
  const moderatorId = idText(record.moderatorId);
  const timestamp = effectiveTimestamp(record);
  const reasonText = record.displayReason || record.privateReason || "";

  return {
    key: `${index}:${userId}`,
    active: record.active,
    statusLabel: statusLabel(record.active),
    name: record.profile.displayName || record.profile.username || `User ${userId}`,
    username: record.profile.username || "unknown",
    userIdLabel: userId || "?",
    avatarUrl: record.profile.avatarUrl || AVATAR_PLACEHOLDER,
    reasonLabel: record.shortReason.trim() || "Other",
    reasonSlug: reasonSlug(record.shortReason),
    moderatorLabel: moderatorId ? `Moderator ${moderatorId}` : "Unknown moderator",
    startedLabel: formatAbsoluteTime(timestamp, options.timeZone),
    relativeLabel: formatRelativeTime(timestamp, options.now),
    reasonLines: reasonLines(reasonText),
    reasonTitle: reasonText || "No reason",
    altAccountsLabel: record.excludeAltAccounts ? "Exclude alts" : "Applies to alts",
    referenceLabel: `Ref ${record.userPath || "users"}`,
  };
}

export function toBanListView(records: readonly EnrichedBanRecord[], options: RenderOptions): BanListView {
  return {
    cards: records.map((record, index) => toBanCardView(record, index, options)),
    counts: countBans(records),
    empty: records.length === 0,
  };
}
