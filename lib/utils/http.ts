/**
 * @license MIT
 * @copyright Copyright (c) 2025, GoldFrite
 */

import type { z } from 'zod'
import type { Fetch } from '../../types/auth'
import { LauncherKitError, ErrorType } from '../../types/errors'

export interface HttpResult {
  ok: boolean
  status: number
  /** Raw response body */
  body: string
}

/**
 * Send a request and read the whole body as text. Transport failures become `NET_ERROR`, or
 * `AUTH_CANCELLED` when the request was aborted through its signal.
 */
export async function send(fetch: Fetch, url: string, init: RequestInit): Promise<HttpResult> {
  try {
    const res = await fetch(url, init)
    return { ok: res.ok, status: res.status, body: await res.text() }
  } catch (err: unknown) {
    if (init.signal?.aborted) throw new LauncherKitError(ErrorType.AUTH_CANCELLED, 'Authentication cancelled')
    throw new LauncherKitError(ErrorType.NET_ERROR, `Request to ${url} failed: ${err instanceof Error ? err.message : err}`)
  }
}

/**
 * Parse a JSON body against a schema.
 * @returns The parsed value, or `null` if the body is not JSON or does not match.
 */
export function parseJson<T>(body: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
  let data: unknown
  try {
    data = JSON.parse(body)
  } catch {
    return null
  }
  const parsed = schema.safeParse(data)
  return parsed.success ? parsed.data : null
}

export function jsonHeaders(): Record<string, string> {
  return { 'Content-Type': 'application/json', Accept: 'application/json' }
}
