import { z } from "zod"
import type { LookupSettings } from "../config"
import {
  fetchJsonWithTimeout,
  HttpStatusError,
  MalformedResponseError,
  type FetchImpl,
  type TimerDependencies,
} from "../lib/http"
import type { IdentityProvider, IdentityRecord } from "./lookup-provider"

const IdentityResponseSchema = z.object({
  name: z.string().nullish(),
  displayName: z.string().nullish(),
})

interface IdentityClientDependencies extends TimerDependencies {
  fetchImpl?: FetchImpl
}

export class IdentityClient implements IdentityProvider {
  readonly name = "identity" as const

  private readonly fetchImpl: FetchImpl
  private readonly timers: TimerDependencies

  constructor(
    private readonly settings: LookupSettings,
    dependencies: IdentityClientDependencies = {},
  ) {
    this.fetchImpl = dependencies.fetchImpl ?? ((input, init) => fetch(input, init))
    this.timers = {
      setTimeoutImpl: dependencies.setTimeoutImpl,
      clearTimeoutImpl: dependencies.clearTimeoutImpl,
    }
  }

  async lookupUser(userId: string): Promise<IdentityRecord | null> {
    const endpoint = `${this.settings.identityBaseUrl}/v1/users/${encodeURIComponent(userId)}`
    const { response, payload } = await fetchJsonWithTimeout(
      this.fetchImpl,
      endpoint,
      this.settings.timeoutMs,
      this.timers,
    )

    if (!response.ok) {
      throw new HttpStatusError(endpoint, response.status)
    }

    const parsed = IdentityResponseSchema.safeParse(payload)
    if (!parsed.success) {
      throw new MalformedResponseError(endpoint, parsed.error.issues[0]?.message ?? "invalid body")
    }

    const name = parsed.data.name?.trim()
    if (!name) {
      return null
    }

    return {
      name,
      displayName: parsed.data.displayName?.trim() || null,
    }
  }
}
