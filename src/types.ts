export type UserId = string | number

export interface RawBanRecord {
  userId?: UserId | null
  userPath?: string | null
  place?: string | null
  moderatorId?: UserId | null
  createTime?: string | null
  startTime?: string | null
  active: boolean
  excludeAltAccounts: boolean
  shortReason: string
  displayReason?: string | null
  privateReason?: string | null
}

export interface BanLogPage {
  logs: RawBanRecord[]
  nextPageToken?: string | null
  pagesFetched?: number
}

export interface Profile {
  username: string
  displayName: string
  avatarUrl: string
}

export interface EnrichedBanRecord extends RawBanRecord {
  profile: Profile
}
