import { z } from "zod"
import type { LookupSettings } from "../config"
import {
  fetchJsonWithTimeout,
  HttpStatusError,
  MalformedResponseError,
  type FetchImpl,
  type TimerDependencies,
} from "../lib/http"
import type { AvatarProvider } from "./lookup-provider"

const HeadshotResponseSchema = z.object({
  data: z
    .array(
      z.object({
        imageUrl: z.string().nullish(),
      }),
    )
    .nullish(),
})

interface AvatarClientDependencies extends TimerDependencies {
  fetchImpl?: FetchImpl
}

export class AvatarClient implements AvatarProvider {
  readonly name = "avatar" as const

  private readonly fetchImpl: FetchImpl
  private readonly timers: TimerDependencies

  constructor(
    private readonly settings: LookupSettings,
    dependencies: AvatarClientDependencies = {},
  ) {
    this.fetchImpl = dependencies.fetchImpl ?? ((input, init) => fetch(input, init))
    this.timers = {
      setTimeoutImpl: dependencies.setTimeoutImpl,
      clearTimeoutImpl: dependencies.clearTimeoutImpl,
    }
  }

  async lookupAvatar(userId: string): Promise<string | null> {
    // The endpoint is a batch lookup; a single id is sent and only the first entry is read.
    const query = new URLSearchParams({
      userIds: userId,
      size: this.settings.avatarSize,
      format: "Png",
      isCircular: "true",
    })
    const endpoint = `${this.settings.avatarBaseUrl}/v1/users/avatar-headshot?${query.toString()}`

    const { response, payload } = await fetchJsonWithTimeout(
      this.fetchImpl,
      endpoint,
      this.settings.timeoutMs,
      this.timers,
    )

    if (!response.ok) {
      throw new HttpStatusError(endpoint, response.status)
    }

    const parsed = HeadshotResponseSchema.safeParse(payload)
    if (!parsed.success) {
      throw new MalformedResponseError(endpoint, parsed.error.issues[0]?.message ?? "invalid body")
    }

    const imageUrl = parsed.data.data?.[0]?.imageUrl
    return imageUrl ? imageUrl : null
  }
}
