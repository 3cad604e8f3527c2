import type { Profile, UserId } from "../types"

/**
 * Session-lifetime profile store. Entries are never evicted or refreshed: a
 * user resolved once keeps that profile until the page is reloaded.
 */
export class ProfileCache {
  private readonly entries = new Map<string, Profile>()

  get(userId: UserId): Profile | undefined {
    return this.entries.get(String(userId))
  }

  put(userId: UserId, profile: Profile): void {
    this.entries.set(String(userId), profile)
  }

  has(userId: UserId): boolean {
    return this.entries.has(String(userId))
  }

  get size(): number {
    return this.entries.size
  }
}
