import { z } from "zod"

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent"

export interface LookupSettings {
  identityBaseUrl: string
  avatarBaseUrl: string
  avatarSize: string
  timeoutMs: number
}

export interface RefreshSettings {
  intervalMs: number
  countdownTickMs: number
}

export interface AppConfig {
  bansEndpoint: string
  lookups: LookupSettings
  refresh: RefreshSettings
  logLevel: LogLevel
  timeZone: string | undefined
}

const EnvSchema = z.object({
  BANWATCH_BANS_ENDPOINT: z.string().default("/api/bans"),
  BANWATCH_IDENTITY_BASE_URL: z.string().default("https://users.roblox.com"),
  BANWATCH_AVATAR_BASE_URL: z.string().default("https://thumbnails.roblox.com"),
  BANWATCH_AVATAR_SIZE: z
    .string()
    .regex(/^\d+x\d+$/)
    .default("150x150"),
  BANWATCH_REFRESH_INTERVAL_MS: z.string().optional(),
  BANWATCH_COUNTDOWN_TICK_MS: z.string().optional(),
  BANWATCH_LOOKUP_TIMEOUT_MS: z.string().optional(),
  BANWATCH_LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  BANWATCH_TIME_ZONE: z.string().optional(),
})

function toInteger(input: string | undefined, defaultValue: number): number {
  if (!input) {
    return defaultValue
  }

  const parsed = Number.parseInt(input, 10)
  if (Number.isNaN(parsed)) {
    return defaultValue
  }

  return parsed
}

function toMinInteger(input: string | undefined, defaultValue: number, min: number): number {
  const parsed = toInteger(input, defaultValue)
  return parsed < min ? min : parsed
}

function trimTrailingSlash(url: string): string {
  return url.trim().replace(/\/+$/, "")
}

export function loadConfig(env: Record<string, unknown> = process.env): AppConfig {
  const parsed = EnvSchema.parse(env)
  const timeZone = parsed.BANWATCH_TIME_ZONE?.trim()

  return {
    bansEndpoint: parsed.BANWATCH_BANS_ENDPOINT.trim() || "/api/bans",
    lookups: {
      identityBaseUrl: trimTrailingSlash(parsed.BANWATCH_IDENTITY_BASE_URL),
      avatarBaseUrl: trimTrailingSlash(parsed.BANWATCH_AVATAR_BASE_URL),
      avatarSize: parsed.BANWATCH_AVATAR_SIZE,
      timeoutMs: toMinInteger(parsed.BANWATCH_LOOKUP_TIMEOUT_MS, 5_000, 100),
    },
    refresh: {
      intervalMs: toMinInteger(parsed.BANWATCH_REFRESH_INTERVAL_MS, 20_000, 1_000),
      countdownTickMs: toMinInteger(parsed.BANWATCH_COUNTDOWN_TICK_MS, 500, 50),
    },
    logLevel: parsed.BANWATCH_LOG_LEVEL,
    timeZone: timeZone ? timeZone : undefined,
  }
}
