export type LookupServiceName = "identity" | "avatar"

export interface IdentityRecord {
  name: string
  displayName: string | null
}

export interface IdentityProvider {
  readonly name: "identity"
  /** Resolves null when the service answers but has no name for the user. */
  lookupUser(userId: string): Promise<IdentityRecord | null>
}

export interface AvatarProvider {
  readonly name: "avatar"
  /** Resolves null when the service answers without an image URL. */
  lookupAvatar(userId: string): Promise<string | null>
}
