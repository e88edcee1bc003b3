/**
 * @license MIT
 * @copyright Copyright (c) 2025, GoldFrite
 */

import type { Account, AuthOptions } from '../../types/auth'
import type { FullMicrosoftAuthConfig, MicrosoftAuthConfig } from '../../types/config'
import type { AuthEvents } from '../../types/events'
import { LauncherKitError, ErrorType } from '../../types/errors'
import EventEmitter from '../utils/events'
import openBrowser from '../utils/browser'
import { createLoopbackReceiver } from '../utils/redirect'
import { DEFAULT_CACHE_FILE, DEFAULT_REDIRECT_TIMEOUT } from './constants'
import MicrosoftTokenExchange from './microsofttoken'
import MinecraftServices from './services'
import MinecraftTokenExchange from './minecrafttoken'
import TokenCache from './tokencache'
import XboxLiveExchange from './xboxlive'
import XSTSExchange from './xsts'

/**
 * Authenticate a user with Microsoft and get a Minecraft bearer token.
 *
 * The chain is Microsoft OAuth2 (PKCE, through the system browser and a loopback redirect) → Xbox Live
 * → XSTS → Minecraft services. The Microsoft token is cached on disk, so later calls refresh it
 * silently instead of opening the browser again.
 *
 * @example
 * ```typescript
 * const auth = new MicrosoftAuth({ clientId: 'your-client-id', redirectUri: 'http://127.0.0.1:25585/callback' })
 * auth.on('auth_open_browser', ({ url }) => console.log(`Login at ${url}`))
 * const token = await auth.getMinecraftBearerToken()
 * ```
 */
export default class MicrosoftAuth extends EventEmitter<AuthEvents> {
  private readonly config: FullMicrosoftAuthConfig
  private readonly cache: TokenCache
  private readonly microsoft: MicrosoftTokenExchange
  private readonly xboxLive: XboxLiveExchange
  private readonly xsts: XSTSExchange
  private readonly minecraft: MinecraftTokenExchange
  private readonly services: MinecraftServices

  /**
   * @param config The configuration of the authentication.
   */
  constructor(config: MicrosoftAuthConfig) {
    super()

    if (!config.clientId) throw new LauncherKitError(ErrorType.AUTH_ERROR, 'Microsoft authentication requires a clientId')
    if (!config.redirectUri) throw new LauncherKitError(ErrorType.AUTH_ERROR, 'Microsoft authentication requires a redirectUri')

    this.config = {
      clientId: config.clientId,
      redirectUri: config.redirectUri,
      cacheFile: config.cacheFile ?? DEFAULT_CACHE_FILE,
      timeout: config.timeout ?? DEFAULT_REDIRECT_TIMEOUT,
      fetch: config.fetch ?? ((input, init) => fetch(input, init)),
      openBrowser: config.openBrowser ?? openBrowser,
      createRedirectReceiver: config.createRedirectReceiver ?? createLoopbackReceiver
    }

    this.cache = new TokenCache(this.config.cacheFile)
    this.microsoft = new MicrosoftTokenExchange(this.config, this.cache)
    this.microsoft.forwardEvents(this)
    this.xboxLive = new XboxLiveExchange(this.config.fetch)
    this.xsts = new XSTSExchange(this.config.fetch)
    this.minecraft = new MinecraftTokenExchange(this.config.fetch)
    this.services = new MinecraftServices(this.config.fetch)
  }

  /**
   * Run the whole chain.
   * @returns The Minecraft bearer token, or `null` if the login did not yield an authorization code.
   * @throws {MicrosoftAuthenticationError | XboxLiveAuthenticationError | XSTSError | MinecraftBearerError}
   * If a step is refused. The following steps are not run.
   */
  async getMinecraftBearerToken(options: AuthOptions = {}): Promise<string | null> {
    this.emit('auth_step', { step: 'microsoft' })
    const microsoftToken = await this.microsoft.acquire(options)
    if (!microsoftToken) return null

    this.emit('auth_step', { step: 'xbox_live' })
    const xboxLiveAuth = await this.xboxLive.authenticate(microsoftToken, options)

    this.emit('auth_step', { step: 'xsts' })
    const xstsToken = await this.xsts.authorize(xboxLiveAuth, options)

    this.emit('auth_step', { step: 'minecraft' })
    return await this.minecraft.login(xboxLiveAuth, xstsToken, options)
  }

  /**
   * Run the whole chain, then check that the account owns the game and get its profile.
   * @returns The account information, or `null` if the login did not yield an authorization code.
   */
  async auth(options: AuthOptions = {}): Promise<Account | null> {
    const accessToken = await this.getMinecraftBearerToken(options)
    if (!accessToken) return null

    this.emit('auth_step', { step: 'profile' })
    if (!(await this.services.ownsGame(accessToken, options))) {
      throw new LauncherKitError(ErrorType.AUTH_ERROR, 'Minecraft not owned')
    }
    const profile = await this.services.getProfile(accessToken, options)
    const cached = await this.cache.load()

    return {
      name: profile.name,
      uuid: profile.id,
      accessToken,
      refreshToken: cached?.refresh_token,
      meta: { online: true, type: 'msa' }
    }
  }

  /**
   * Validate a Minecraft bearer token.
   * @returns True if the token is valid, false otherwise (then you should call `getMinecraftBearerToken`).
   */
  async validate(accessToken: string) {
    return await this.services.validate(accessToken)
  }

  /**
   * Forget the cached Microsoft token. The next authentication opens the browser.
   */
  async logout() {
    await this.cache.clear()
  }
}
