import { describe, expect, test } from "vitest"
import { AVATAR_PLACEHOLDER } from "../src/lib/avatar-placeholder"
import type { FetchImpl } from "../src/lib/http"
import { AvatarClient } from "../src/services/avatar-client"
import { IdentityClient } from "../src/services/identity-client"
import type { AvatarProvider, IdentityProvider, IdentityRecord } from "../src/services/lookup-provider"
import { ProfileCache } from "../src/services/profile-cache"
import { ProfileResolver, UNKNOWN_PROFILE } from "../src/services/profile-resolver"
import { jsonResponse, silentLoggers, testConfig } from "./helpers"

class MockIdentity implements IdentityProvider {
  readonly name = "identity" as const
  calls: string[] = []

  constructor(private readonly handler: (userId: string) => Promise<IdentityRecord | null>) {}

  async lookupUser(userId: string): Promise<IdentityRecord | null> {
    this.calls.push(userId)
    return this.handler(userId)
  }
}

class MockAvatar implements AvatarProvider {
  readonly name = "avatar" as const
  calls: string[] = []

  constructor(private readonly handler: (userId: string) => Promise<string | null>) {}

  async lookupAvatar(userId: string): Promise<string | null> {
    this.calls.push(userId)
    return this.handler(userId)
  }
}

function buildResolver(identity: IdentityProvider, avatar: AvatarProvider, cache = new ProfileCache()) {
  return { cache, resolver: new ProfileResolver(cache, { identity, avatar }, silentLoggers().lookups) }
}

describe("profile resolver", () => {
  test("returns the unknown profile for absent ids without touching cache or network", async () => {
    const identity = new MockIdentity(async () => ({ name: "x", displayName: null }))
    const avatar = new MockAvatar(async () => "https://cdn.example/x.png")
    const { cache, resolver } = buildResolver(identity, avatar)

    expect(await resolver.resolve(undefined)).toEqual(UNKNOWN_PROFILE)
    expect(await resolver.resolve(null)).toEqual(UNKNOWN_PROFILE)
    expect(await resolver.resolve("  ")).toEqual(UNKNOWN_PROFILE)
    expect(identity.calls).toEqual([])
    expect(avatar.calls).toEqual([])
    expect(cache.size).toBe(0)
  })

  test("fills every field from both services", async () => {
    const identity = new MockIdentity(async () => ({ name: "builder42", displayName: "Builder" }))
    const avatar = new MockAvatar(async () => "https://cdn.example/42.png")
    const { resolver } = buildResolver(identity, avatar)

    expect(await resolver.resolve("42")).toEqual({
      username: "builder42",
      displayName: "Builder",
      avatarUrl: "https://cdn.example/42.png",
    })
  })

  test("uses the username as display name when the service has none", async () => {
    const identity = new MockIdentity(async () => ({ name: "builder42", displayName: null }))
    const avatar = new MockAvatar(async () => null)
    const { resolver } = buildResolver(identity, avatar)

    expect(await resolver.resolve("42")).toEqual({
      username: "builder42",
      displayName: "builder42",
      avatarUrl: AVATAR_PLACEHOLDER,
    })
  })

  test("keeps the default username but takes the avatar when identity fails", async () => {
    const identity = new MockIdentity(async () => {
      throw new Error("identity down")
    })
    const avatar = new MockAvatar(async () => "https://cdn.example/42.png")
    const { resolver } = buildResolver(identity, avatar)

    expect(await resolver.resolve(42)).toEqual({
      username: "User 42",
      displayName: "",
      avatarUrl: "https://cdn.example/42.png",
    })
  })

  test("keeps the placeholder avatar when the avatar lookup fails", async () => {
    const identity = new MockIdentity(async () => ({ name: "builder42", displayName: "Builder" }))
    const avatar = new MockAvatar(async () => {
      throw new Error("thumbnails down")
    })
    const { resolver } = buildResolver(identity, avatar)

    expect(await resolver.resolve("42")).toEqual({
      username: "builder42",
      displayName: "Builder",
      avatarUrl: AVATAR_PLACEHOLDER,
    })
  })

  test("looks up each id once across repeated calls", async () => {
    const identity = new MockIdentity(async (userId) => ({ name: `user${userId}`, displayName: null }))
    const avatar = new MockAvatar(async () => null)
    const { cache, resolver } = buildResolver(identity, avatar)

    const first = await resolver.resolve("7")
    const second = await resolver.resolve(7)
    const third = await resolver.resolve("7")

    expect(second).toBe(first)
    expect(third).toBe(first)
    expect(identity.calls).toEqual(["7"])
    expect(avatar.calls).toEqual(["7"])
    expect(cache.has(7)).toBe(true)
  })

  test("caches failed lookups as their default profile", async () => {
    const identity = new MockIdentity(async () => {
      throw new Error("identity down")
    })
    const avatar = new MockAvatar(async () => {
      throw new Error("thumbnails down")
    })
    const { resolver } = buildResolver(identity, avatar)

    await resolver.resolve("9")
    await resolver.resolve("9")

    expect(identity.calls).toEqual(["9"])
    expect(avatar.calls).toEqual(["9"])
  })

  test("shares one lookup between concurrent calls for the same id", async () => {
    const identity = new MockIdentity(async () => ({ name: "shared", displayName: null }))
    const avatar = new MockAvatar(async () => null)
    const { resolver } = buildResolver(identity, avatar)

    const [a, b] = await Promise.all([resolver.resolve("5"), resolver.resolve("5")])

    expect(a).toBe(b)
    expect(identity.calls).toEqual(["5"])
    expect(avatar.calls).toEqual(["5"])
  })

  test("treats a timed-out identity lookup like any other failure", async () => {
    const settings = testConfig({ BANWATCH_LOOKUP_TIMEOUT_MS: "100" }).lookups
    const hangingFetch: FetchImpl = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")))
      })
    const identity = new IdentityClient(settings, { fetchImpl: hangingFetch })
    const avatar = new AvatarClient(settings, {
      fetchImpl: async () => jsonResponse({ data: [{ imageUrl: "https://cdn.example/77.png" }] }),
    })
    const { resolver } = buildResolver(identity, avatar)

    expect(await resolver.resolve("77")).toEqual({
      username: "User 77",
      displayName: "",
      avatarUrl: "https://cdn.example/77.png",
    })
  })
})
