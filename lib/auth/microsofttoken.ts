/**
 * @license MIT
 * @copyright Copyright (c) 2025, GoldFrite
 */

import type { AuthOptions, MicrosoftToken, PkcePair } from '../../types/auth'
import type { FullMicrosoftAuthConfig } from '../../types/config'
import type { AuthEvents } from '../../types/events'
import { LauncherKitError, ErrorType, MicrosoftAuthenticationError } from '../../types/errors'
import EventEmitter from '../utils/events'
import { parseJson, send } from '../utils/http'
import { MICROSOFT_AUTHORIZE_URL, MICROSOFT_COBRAND_ID, MICROSOFT_SCOPE, MICROSOFT_TOKEN_URL } from './constants'
import { createPkcePair, generateState } from './pkce'
import { microsoftTokenSchema } from './schemas'
import type TokenCache from './tokencache'

/**
 * First hop of the chain: get a Microsoft token, silently with the cached refresh token when
 * possible, through the browser otherwise.
 */
export default class MicrosoftTokenExchange extends EventEmitter<AuthEvents> {
  private readonly config: FullMicrosoftAuthConfig
  private readonly cache: TokenCache

  constructor(config: FullMicrosoftAuthConfig, cache: TokenCache) {
    super()
    this.config = config
    this.cache = cache
  }

  /**
   * Get a Microsoft token.
   * @returns The token, or `null` if the redirect came back without an authorization code (eg. the
   * user refused the consent).
   */
  async acquire(options: AuthOptions = {}): Promise<MicrosoftToken | null> {
    const pkce = createPkcePair()
    const state = generateState()

    if (this.cache.exists()) {
      try {
        const token = await this.refresh(options)
        this.emit('auth_refresh', { success: token !== null })
        if (token) return token
      } catch (err: unknown) {
        this.emit('auth_refresh', { success: false, message: err instanceof Error ? err.message : String(err) })
      }
      if (options.signal?.aborted) throw new LauncherKitError(ErrorType.AUTH_CANCELLED, 'Authentication cancelled')
    }

    const code = await this.requestAuthorizationCode(pkce, state, options)
    if (!code) return null

    return await this.exchangeCode(code, pkce.codeVerifier, options)
  }

  /**
   * Renew the cached token with its refresh token.
   * @returns The new token, or `null` if there is no cached token or the server refused the refresh.
   */
  async refresh(options: AuthOptions = {}): Promise<MicrosoftToken | null> {
    const cached = await this.cache.load()
    if (!cached) return null

    const res = await this.requestToken(
      {
        client_id: this.config.clientId,
        refresh_token: cached.refresh_token,
        grant_type: 'refresh_token',
        redirect_uri: this.config.redirectUri
      },
      options.signal
    )

    if (!res.ok) {
      this.emit('auth_debug', `Refresh token refused: HTTP ${res.status}`)
      return null
    }

    const token = parseJson(res.body, microsoftTokenSchema)
    if (!token) throw new LauncherKitError(ErrorType.MICROSOFT_AUTH_ERROR, `Unexpected response while refreshing the Microsoft token: ${res.body}`)

    await this.cache.store(token)
    return token
  }

  /**
   * Exchange an authorization code for a token, and cache it.
   * @param code The code received on the redirect URI.
   * @param codeVerifier The PKCE verifier whose challenge was sent with the authorize URL.
   */
  async exchangeCode(code: string, codeVerifier: string, options: AuthOptions = {}): Promise<MicrosoftToken> {
    const res = await this.requestToken(
      {
        client_id: this.config.clientId,
        code,
        code_verifier: codeVerifier,
        grant_type: 'authorization_code',
        redirect_uri: this.config.redirectUri
      },
      options.signal
    )

    if (!res.ok) throw new MicrosoftAuthenticationError(this.config.clientId, code, res.body)

    const token = parseJson(res.body, microsoftTokenSchema)
    if (!token) throw new MicrosoftAuthenticationError(this.config.clientId, code, res.body, 'Unexpected response from the Microsoft token endpoint')

    await this.cache.store(token)
    return token
  }

  buildAuthorizeUrl(codeChallenge: string, state: string) {
    const params = new URLSearchParams({
      client_id: this.config.clientId,
      response_type: 'code',
      redirect_uri: this.config.redirectUri,
      scope: MICROSOFT_SCOPE,
      state,
      cobrandid: MICROSOFT_COBRAND_ID,
      prompt: 'select_account',
      code_challenge: codeChallenge,
      code_challenge_method: 'S256'
    })
    return `${MICROSOFT_AUTHORIZE_URL}?${params.toString()}`
  }

  private async requestAuthorizationCode(pkce: PkcePair, state: string, options: AuthOptions) {
    const receiver = this.config.createRedirectReceiver(this.config.redirectUri)
    await receiver.listen()

    const url = this.buildAuthorizeUrl(pkce.codeChallenge, state)
    this.emit('auth_open_browser', { url })
    try {
      await this.config.openBrowser(url)
    } catch (err: unknown) {
      await receiver.close()
      throw err
    }

    const query = await receiver.waitForQuery({ timeout: this.config.timeout, signal: options.signal })
    const params = new URLSearchParams(query)

    const code = params.get('code')
    if (!code) {
      const error = params.get('error')
      this.emit('auth_debug', `Redirect without authorization code${error ? `: ${error} ${params.get('error_description') ?? ''}`.trimEnd() : ''}`)
      return null
    }
    if (params.get('state') !== state) {
      throw new LauncherKitError(ErrorType.AUTH_ERROR, 'The state returned on the redirect does not match the one sent')
    }

    return code
  }

  private requestToken(params: Record<string, string>, signal?: AbortSignal) {
    return send(this.config.fetch, MICROSOFT_TOKEN_URL, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams(params).toString(),
      signal
    })
  }
}
