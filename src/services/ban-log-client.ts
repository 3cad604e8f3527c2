import { z } from "zod"
import { extractErrorMessage, readJsonBody, type FetchImpl } from "../lib/http"
import type { BanLogPage } from "../types"

export const DEFAULT_BAN_LOG_ERROR = "Failed to fetch ban logs"

const IdSchema = z.union([z.string(), z.number()])

const RawBanRecordSchema = z.object({
  userId: IdSchema.nullish(),
  userPath: z.string().nullish(),
  place: z.string().nullish(),
  moderatorId: IdSchema.nullish(),
  createTime: z.string().nullish(),
  startTime: z.string().nullish(),
  active: z.boolean().nullish().transform((value) => value ?? false),
  excludeAltAccounts: z.boolean().nullish().transform((value) => value ?? false),
  shortReason: z.string().nullish().transform((value) => value ?? ""),
  displayReason: z.string().nullish(),
  privateReason: z.string().nullish(),
})

const BanLogPageSchema = z.object({
  logs: z
    .array(RawBanRecordSchema)
    .nullish()
    .transform((value) => value ?? []),
  nextPageToken: z.string().nullish(),
  pagesFetched: z.number().int().nonnegative().optional(),
})

export class BanLogFetchError extends Error {
  constructor(
    message: string,
    readonly status: number | null = null,
    cause?: unknown,
  ) {
    super(message, { cause })
    this.name = "BanLogFetchError"
  }
}

interface BanLogClientDependencies {
  fetchImpl?: FetchImpl
}

export class BanLogClient {
  private readonly fetchImpl: FetchImpl

  constructor(
    private readonly endpoint: string,
    dependencies: BanLogClientDependencies = {},
  ) {
    this.fetchImpl = dependencies.fetchImpl ?? ((input, init) => fetch(input, init))
  }

  async fetchPage(): Promise<BanLogPage> {
    let response: Response
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: "GET",
        headers: {
          Accept: "application/json",
        },
      })
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new BanLogFetchError(`${DEFAULT_BAN_LOG_ERROR}: ${reason}`, null, error)
    }

    const payload = await readJsonBody(response)

    if (!response.ok) {
      throw new BanLogFetchError(extractErrorMessage(payload) ?? DEFAULT_BAN_LOG_ERROR, response.status)
    }

    if (payload === null) {
      throw new BanLogFetchError("Ban log response was not valid JSON", response.status)
    }

    const parsed = BanLogPageSchema.safeParse(payload)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : ""
      throw new BanLogFetchError(
        `Ban log response was malformed${where}: ${issue?.message ?? "invalid body"}`,
        response.status,
        parsed.error,
      )
    }

    return parsed.data
  }
}
