import axios, { type AxiosInstance } from 'axios'

export interface HttpClientOptions {
  timeoutMs: number
}

/* eslint-disable @typescript-eslint/naming-convention */
export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  return axios.create({
    timeout: options.timeoutMs,
    headers: {
      Accept: 'application/json',
      'Content-Type': 'application/json',
      'User-Agent': 'race-action-scheduler/1.0.0',
    },
  })
}
/* eslint-enable @typescript-eslint/naming-convention */

/**
 * Short, log-safe description of a failed request.
 */
export function describeHttpError(error: unknown): {
  message: string
  statusCode?: number
  responseExcerpt?: string
} {
  if (axios.isAxiosError(error)) {
    const statusCode = error.response?.status
    const responseExcerpt =
      error.response === undefined
        ? undefined
        : JSON.stringify(error.response.data ?? null).slice(0, 200)
    return { message: error.message, statusCode, responseExcerpt }
  }

  return { message: error instanceof Error ? error.message : String(error) }
}
