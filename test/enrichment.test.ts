import { describe, expect, test } from "vitest"
import { enrichBanRecords, sortByRecency, type ProfileSource } from "../src/services/enrichment"
import { ProfileCache } from "../src/services/profile-cache"
import { ProfileResolver } from "../src/services/profile-resolver"
import type { Profile, UserId } from "../src/types"
import { profile, rawRecord, silentLoggers } from "./helpers"

const records = [
  rawRecord({ userId: "a", startTime: "2024-03-01T00:00:00Z" }),
  rawRecord({ userId: "b", createTime: "2024-05-01T00:00:00Z" }),
  rawRecord({ userId: "c" }),
  rawRecord({ userId: "d", startTime: "not-a-date" }),
  rawRecord({ userId: "e", startTime: "2024-03-01T00:00:00Z" }),
  rawRecord({ userId: "f", startTime: "2024-01-01T00:00:00Z", createTime: "2025-01-01T00:00:00Z" }),
]

const expectedOrder = ["b", "a", "e", "f", "c", "d"]

class DelayedProfiles implements ProfileSource {
  calls: string[] = []

  constructor(private readonly delays: Record<string, number>) {}

  async resolve(userId: UserId | null | undefined): Promise<Profile> {
    const key = String(userId)
    this.calls.push(key)
    await new Promise((resolve) => setTimeout(resolve, this.delays[key] ?? 0))
    return profile(`user-${key}`)
  }
}

describe("enrichment pipeline", () => {
  test("sorts newest first by start time, falling back to create time", () => {
    const sorted = sortByRecency(records)

    expect(sorted.map((record) => record.userId)).toEqual(expectedOrder)
  })

  test("attaches a profile to every record and returns a permutation", async () => {
    const profiles = new DelayedProfiles({})

    const enriched = await enrichBanRecords(records, profiles)

    expect(enriched).toHaveLength(records.length)
    expect(enriched.map((record) => record.userId)).toEqual(expectedOrder)
    for (const record of enriched) {
      expect(record.profile.username).toBe(`user-${String(record.userId)}`)
    }
    expect([...profiles.calls].sort()).toEqual(["a", "b", "c", "d", "e", "f"])
  })

  test("order does not depend on which lookup finishes first", async () => {
    const slowFirst = await enrichBanRecords(records, new DelayedProfiles({ a: 30, b: 20, c: 10 }))
    const slowLast = await enrichBanRecords(records, new DelayedProfiles({ d: 30, e: 20, f: 10 }))

    expect(slowFirst.map((record) => record.userId)).toEqual(expectedOrder)
    expect(slowLast.map((record) => record.userId)).toEqual(expectedOrder)
  })

  test("does not mutate the raw records", async () => {
    const input = [rawRecord({ userId: "a", startTime: "2024-03-01T00:00:00Z" })]

    const [enriched] = await enrichBanRecords(input, new DelayedProfiles({}))

    expect(enriched).not.toBe(input[0])
    expect(input[0]).not.toHaveProperty("profile")
  })

  test("a failing lookup for one user still yields a profile for every record", async () => {
    const resolver = new ProfileResolver(
      new ProfileCache(),
      {
        identity: {
          name: "identity",
          lookupUser: async (userId) => {
            if (userId === "2") {
              throw new Error("identity down")
            }
            return { name: `player${userId}`, displayName: null }
          },
        },
        avatar: { name: "avatar", lookupAvatar: async () => null },
      },
      silentLoggers().lookups,
    )

    const enriched = await enrichBanRecords(
      [
        rawRecord({ userId: "1", startTime: "2024-02-01T00:00:00Z" }),
        rawRecord({ userId: "2", startTime: "2024-01-01T00:00:00Z" }),
        rawRecord({ startTime: "2023-12-01T00:00:00Z" }),
      ],
      resolver,
    )

    expect(enriched.map((record) => record.profile.username)).toEqual(["player1", "User 2", "Unknown"])
  })

  test("an empty batch enriches to an empty list", async () => {
    expect(await enrichBanRecords([], new DelayedProfiles({}))).toEqual([])
  })
})
