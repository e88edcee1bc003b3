import fs from 'node:fs/promises'
import os from 'node:os'
import path_ from 'node:path'
import { vi } from 'vitest'
import type { RedirectReceiver } from '../types/auth'

type Route = (init: RequestInit | undefined) => Response

/**
 * In-process stand-in for `fetch`, answering by exact URL.
 */
export function mockFetch(routes: Record<string, Route>) {
  return vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url
    const route = routes[url]
    if (!route) throw new Error(`Unexpected request to ${url}`)
    return route(init)
  })
}

export function json(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
}

export function text(body: string, status: number) {
  return new Response(body, { status })
}

export function formBody(init: RequestInit | undefined) {
  return new URLSearchParams(String(init?.body))
}

export function jsonBody(init: RequestInit | undefined): unknown {
  return JSON.parse(String(init?.body))
}

export class FakeReceiver implements RedirectReceiver {
  listening = false
  closed = false
  private readonly query: () => string

  constructor(query: () => string) {
    this.query = query
  }

  async listen() {
    this.listening = true
  }

  async waitForQuery() {
    this.closed = true
    return this.query()
  }

  async close() {
    this.closed = true
  }
}

/**
 * Stands in for the browser and the loopback listener: every login "redirects" with the query built
 * by `respond` from the authorize URL that was opened.
 */
export class FakeLogin {
  readonly urls: string[] = []
  readonly receivers: FakeReceiver[] = []
  private readonly respond: (authorizeUrl: URL) => string

  constructor(respond: (authorizeUrl: URL) => string) {
    this.respond = respond
  }

  static approving(code: string) {
    return new FakeLogin((url) => new URLSearchParams({ code, state: url.searchParams.get('state') ?? '' }).toString())
  }

  readonly openBrowser = vi.fn(async (url: string) => {
    this.urls.push(url)
  })

  readonly createRedirectReceiver = (redirectUri: string): RedirectReceiver => {
    const receiver = new FakeReceiver(() => this.respond(new URL(this.urls[this.urls.length - 1])))
    this.receivers.push(receiver)
    return receiver
  }
}

export async function tempDir() {
  return await fs.mkdtemp(path_.join(os.tmpdir(), 'mc-launcher-kit-'))
}
