/**
 * @license MIT
 * @copyright Copyright (c) 2025, GoldFrite
 */

import type { AuthOptions, Fetch, XboxLiveAuthResponse } from '../../types/auth'
import { MinecraftBearerError } from '../../types/errors'
import { jsonHeaders, parseJson, send } from '../utils/http'
import { MINECRAFT_LOGIN_URL } from './constants'
import { minecraftLoginSchema } from './schemas'

export default class MinecraftTokenExchange {
  private readonly fetch: Fetch

  constructor(fetch: Fetch) {
    this.fetch = fetch
  }

  /**
   * Log in to Minecraft services with the Xbox identity.
   * @param xboxLiveAuth The Xbox Live response, for the user hash.
   * @param xstsToken The XSTS token.
   * @returns The Minecraft bearer token.
   * @throws {MinecraftBearerError} If Minecraft services refuse the identity.
   */
  async login(xboxLiveAuth: XboxLiveAuthResponse, xstsToken: string, options: AuthOptions = {}): Promise<string> {
    const uhs = xboxLiveAuth.displayClaims.xui[0]?.uhs
    if (!uhs) throw new MinecraftBearerError(xstsToken, '', 'The Xbox Live response has no user hash')

    const res = await send(this.fetch, MINECRAFT_LOGIN_URL, {
      method: 'POST',
      headers: jsonHeaders(),
      body: JSON.stringify({ identityToken: `XBL3.0 x=${uhs};${xstsToken}`, ensureLegacyEnabled: true }),
      signal: options.signal
    })

    if (!res.ok) throw new MinecraftBearerError(xstsToken, res.body)

    const login = parseJson(res.body, minecraftLoginSchema)
    if (!login) throw new MinecraftBearerError(xstsToken, res.body, 'Unexpected response from Minecraft services')

    return login.access_token
  }
}
