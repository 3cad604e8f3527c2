export type FetchImpl = (input: Request | URL | string, init?: RequestInit) => Promise<Response>

export interface TimerDependencies {
  setTimeoutImpl?: typeof setTimeout
  clearTimeoutImpl?: typeof clearTimeout
}

export class RequestTimeoutError extends Error {
  constructor(
    readonly url: string,
    readonly timeoutMs: number,
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`)
    this.name = "RequestTimeoutError"
  }
}

export class HttpStatusError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
  ) {
    super(`Request to ${url} returned ${status}`)
    this.name = "HttpStatusError"
  }
}

export interface JsonResult {
  response: Response
  payload: unknown
}

/**
 * Fetches `url` and reads its JSON body inside one timeout window, so a stalled
 * body counts against the same deadline as a stalled connection.
 */
export async function fetchJsonWithTimeout(
  fetchImpl: FetchImpl,
  url: string,
  timeoutMs: number,
  timers: TimerDependencies = {},
): Promise<JsonResult> {
  const setTimeoutImpl = timers.setTimeoutImpl ?? setTimeout
  const clearTimeoutImpl = timers.clearTimeoutImpl ?? clearTimeout

  const controller = new AbortController()
  const timeoutHandle = setTimeoutImpl(() => controller.abort(), timeoutMs)

  try {
    const response = await fetchImpl(url, {
      method: "GET",
      headers: {
        Accept: "application/json",
      },
      signal: controller.signal,
    })
    const payload = await readJsonBody(response)
    if (controller.signal.aborted) {
      throw new RequestTimeoutError(url, timeoutMs)
    }
    return { response, payload }
  } catch (error) {
    if (controller.signal.aborted) {
      throw new RequestTimeoutError(url, timeoutMs)
    }
    throw error
  } finally {
    clearTimeoutImpl(timeoutHandle)
  }
}

export async function readJsonBody(response: Response): Promise<unknown> {
  try {
    return await response.json()
  } catch {
    return null
  }
}

export function extractErrorMessage(payload: unknown): string | null {
  if (!payload || typeof payload !== "object") {
    return null
  }

  const error = "error" in payload ? payload.error : undefined
  if (typeof error === "string" && error.trim()) {
    return error
  }

  if (error && typeof error === "object" && "message" in error) {
    const { message } = error
    if (typeof message === "string" && message.trim()) {
      return message
    }
  }

  return null
}

export class MalformedResponseError extends Error {
  constructor(
    readonly url: string,
    detail: string,
  ) {
    super(`Malformed response from ${url}: ${detail}`)
    this.name = "MalformedResponseError"
  }
}
