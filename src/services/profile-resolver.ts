import type pino from "pino"
import { AVATAR_PLACEHOLDER } from "../lib/avatar-placeholder"
import type { Profile, UserId } from "../types"
import type { ProfileCache } from "./profile-cache"
import type { AvatarProvider, IdentityProvider, IdentityRecord } from "./lookup-provider"

export const UNKNOWN_PROFILE: Readonly<Profile> = Object.freeze({
  username: "Unknown",
  displayName: "Unknown user",
  avatarUrl: AVATAR_PLACEHOLDER,
})

export interface ProfileProviders {
  identity: IdentityProvider
  avatar: AvatarProvider
}

export function normalizeUserId(userId: UserId | null | undefined): string {
  if (userId === null || userId === undefined) {
    return ""
  }
  return String(userId).trim()
}

export class ProfileResolver {
  private readonly pending = new Map<string, Promise<Profile>>()

  constructor(
    private readonly cache: ProfileCache,
    private readonly providers: ProfileProviders,
    private readonly logger: pino.Logger,
  ) {}

  async resolve(userId: UserId | null | undefined): Promise<Profile> {
    const key = normalizeUserId(userId)
    if (!key) {
      return { ...UNKNOWN_PROFILE }
    }

    const cached = this.cache.get(key)
    if (cached) {
      return cached
    }

    const inFlight = this.pending.get(key)
    if (inFlight) {
      return inFlight
    }

    const task = this.lookup(key).finally(() => {
      this.pending.delete(key)
    })
    this.pending.set(key, task)
    return task
  }

  private async lookup(userId: string): Promise<Profile> {
    const [identity, avatarUrl] = await Promise.all([
      this.lookupIdentity(userId),
      this.lookupAvatar(userId),
    ])

    const username = identity?.name ?? `User ${userId}`
    const profile: Profile = {
      username,
      displayName: identity ? (identity.displayName ?? username) : "",
      avatarUrl: avatarUrl ?? AVATAR_PLACEHOLDER,
    }

    this.cache.put(userId, profile)
    return profile
  }

  private async lookupIdentity(userId: string): Promise<IdentityRecord | null> {
    try {
      return await this.providers.identity.lookupUser(userId)
    } catch (error) {
      this.logger.warn({ error, userId, lookup: this.providers.identity.name }, "identity lookup failed; keeping default profile")
      return null
    }
  }

  private async lookupAvatar(userId: string): Promise<string | null> {
    try {
      return await this.providers.avatar.lookupAvatar(userId)
    } catch (error) {
      this.logger.warn({ error, userId, lookup: this.providers.avatar.name }, "avatar lookup failed; keeping placeholder")
      return null
    }
  }
}
