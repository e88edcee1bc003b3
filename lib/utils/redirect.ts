/**
 * @license MIT
 * @copyright Copyright (c) 2025, GoldFrite
 */

import http from 'node:http'
import type { RedirectReceiver } from '../../types/auth'
import { LauncherKitError, ErrorType, NoAuthorizationCodeError } from '../../types/errors'

const PAGE = (message: string) =>
  `<!DOCTYPE html><html><head><meta charset="utf-8"><title>Minecraft login</title></head><body><p>${message}</p></body></html>`

type Outcome = { query: string } | { error: Error }

/**
 * Local HTTP listener that captures the first request made to the redirect URI, then stops.
 *
 * Requests to other paths (eg. `/favicon.ico`) get a 404 and are ignored.
 */
export default class LoopbackRedirectReceiver implements RedirectReceiver {
  private readonly redirectUri: string
  private readonly target: URL
  private readonly server: http.Server
  private outcome: Outcome | null = null
  private notify: (() => void) | null = null

  /**
   * @param redirectUri An `http://` loopback URI. Port `0` listens on a random free port (see `port`).
   * `localhost` is listened on at `127.0.0.1`, whatever the system resolves it to.
   */
  constructor(redirectUri: string) {
    this.redirectUri = redirectUri
    this.target = new URL(redirectUri)
    if (this.target.protocol !== 'http:') {
      throw new LauncherKitError(ErrorType.AUTH_ERROR, `The redirect URI must use http:// to be captured locally, got ${redirectUri}`)
    }
    this.server = http.createServer((req, res) => this.handle(req, res))
  }

  /**
   * The port the listener is bound to, once `listen` resolved.
   */
  get port() {
    const address = this.server.address()
    return address && typeof address === 'object' ? address.port : null
  }

  listen() {
    const hostname = this.target.hostname.replace(/^\[(.*)\]$/, '$1')
    const host = hostname === 'localhost' ? '127.0.0.1' : hostname
    const port = this.target.port ? parseInt(this.target.port) : 80

    return new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => reject(new LauncherKitError(ErrorType.NET_ERROR, `Unable to listen on ${this.redirectUri}: ${err.message}`))
      this.server.once('error', onError)
      this.server.listen(port, host, () => {
        this.server.off('error', onError)
        resolve()
      })
    })
  }

  async waitForQuery(options: { timeout: number; signal?: AbortSignal }) {
    try {
      return await new Promise<string>((resolve, reject) => {
        let timer: NodeJS.Timeout | undefined
        const cleanup = () => {
          clearTimeout(timer)
          options.signal?.removeEventListener('abort', onAbort)
          this.notify = null
        }
        const onAbort = () => {
          cleanup()
          reject(new LauncherKitError(ErrorType.AUTH_CANCELLED, 'Authentication cancelled while waiting for the browser redirect'))
        }

        if (options.signal?.aborted) return onAbort()
        options.signal?.addEventListener('abort', onAbort, { once: true })
        if (options.timeout > 0) {
          timer = setTimeout(() => {
            cleanup()
            reject(new LauncherKitError(ErrorType.AUTH_TIMEOUT, `No browser redirect received after ${options.timeout} ms`))
          }, options.timeout)
        }

        this.notify = () => {
          const outcome = this.outcome
          if (!outcome) return
          cleanup()
          if ('query' in outcome) resolve(outcome.query)
          else reject(outcome.error)
        }
        this.notify()
      })
    } finally {
      await this.close()
    }
  }

  async close() {
    if (!this.server.listening) return
    await new Promise<void>((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()))
      this.server.closeIdleConnections()
    })
  }

  private handle(req: http.IncomingMessage, res: http.ServerResponse) {
    let url: URL
    try {
      url = new URL(req.url ?? '/', this.target)
    } catch {
      res.writeHead(400, { Connection: 'close' }).end()
      return
    }
    if (this.outcome || url.pathname !== this.target.pathname) {
      res.writeHead(404, { Connection: 'close' }).end()
      return
    }

    const query = url.search.replace(/^\?/, '')
    res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8', Connection: 'close' })
    res.end(PAGE(query ? 'You can close this window and go back to the launcher.' : 'The login did not complete. Please try again.'))

    this.outcome = query ? { query } : { error: new NoAuthorizationCodeError(this.redirectUri) }
    this.notify?.()
  }
}

/**
 * Default receiver factory.
 */
export function createLoopbackReceiver(redirectUri: string): RedirectReceiver {
  return new LoopbackRedirectReceiver(redirectUri)
}
