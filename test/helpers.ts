import pino from "pino"
import { loadConfig, type AppConfig } from "../src/config"
import type { Loggers } from "../src/logger"
import type { EnrichedBanRecord, Profile, RawBanRecord } from "../src/types"

export function silentLoggers(): Loggers {
  return {
    app: pino({ level: "silent" }),
    lookups: pino({ level: "silent" }),
  }
}

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    BANWATCH_LOG_LEVEL: "silent",
    BANWATCH_TIME_ZONE: "UTC",
    ...overrides,
  })
}

export function jsonResponse(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { "content-type": "application/json" },
  })
}

export function rawRecord(overrides: Partial<RawBanRecord> = {}): RawBanRecord {
  return {
    active: false,
    excludeAltAccounts: false,
    shortReason: "",
    ...overrides,
  }
}

export function profile(username: string, overrides: Partial<Profile> = {}): Profile {
  return {
    username,
    displayName: username,
    avatarUrl: `https://cdn.example/${username}.png`,
    ...overrides,
  }
}

export function enrichedRecord(
  overrides: Partial<RawBanRecord> = {},
  profileOverride: Profile = profile("player"),
): EnrichedBanRecord {
  return { ...rawRecord(overrides), profile: profileOverride }
}

export interface Deferred<T> {
  promise: Promise<T>
  resolve: (value: T) => void
  reject: (reason: unknown) => void
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined
  let reject: (reason: unknown) => void = () => undefined
  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}
