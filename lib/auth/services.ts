/**
 * @license MIT
 * @copyright Copyright (c) 2025, GoldFrite
 */

import type { AuthOptions, Fetch, MinecraftProfile } from '../../types/auth'
import { LauncherKitError, ErrorType } from '../../types/errors'
import { parseJson, send } from '../utils/http'
import { MINECRAFT_ENTITLEMENTS_URL, MINECRAFT_PROFILE_URL } from './constants'
import { entitlementsSchema, minecraftProfileSchema } from './schemas'

/**
 * Calls to Minecraft services made with a bearer token.
 */
export default class MinecraftServices {
  private readonly fetch: Fetch

  constructor(fetch: Fetch) {
    this.fetch = fetch
  }

  /**
   * Get the Minecraft profile (UUID and player name) of the account.
   */
  async getProfile(accessToken: string, options: AuthOptions = {}): Promise<MinecraftProfile> {
    const res = await send(this.fetch, MINECRAFT_PROFILE_URL, {
      method: 'GET',
      headers: { Authorization: `Bearer ${accessToken}` },
      signal: options.signal
    })

    if (!res.ok) throw new LauncherKitError(ErrorType.AUTH_ERROR, `Error while getting the Minecraft profile: HTTP ${res.status} - ${res.body}`)

    const profile = parseJson(res.body, minecraftProfileSchema)
    if (!profile) throw new LauncherKitError(ErrorType.AUTH_ERROR, `Unexpected Minecraft profile: ${res.body}`)

    return profile
  }

  /**
   * Check whether the account owns Minecraft: Java Edition.
   */
  async ownsGame(accessToken: string, options: AuthOptions = {}) {
    const res = await send(this.fetch, MINECRAFT_ENTITLEMENTS_URL, {
      method: 'GET',
      headers: { Authorization: `Bearer ${accessToken}` },
      signal: options.signal
    })

    if (!res.ok) throw new LauncherKitError(ErrorType.AUTH_ERROR, `Failed to check game ownership: HTTP ${res.status} - ${res.body}`)

    const entitlements = parseJson(res.body, entitlementsSchema)
    if (!entitlements) throw new LauncherKitError(ErrorType.AUTH_ERROR, `Unexpected entitlements response: ${res.body}`)

    return entitlements.items.some((i) => i.name === 'product_minecraft' || i.name === 'game_minecraft')
  }

  /**
   * Check whether a bearer token is still accepted.
   * @returns True if the token is valid, false otherwise (then you should authenticate again).
   */
  async validate(accessToken: string) {
    try {
      const res = await this.fetch(MINECRAFT_PROFILE_URL, {
        method: 'GET',
        headers: { Authorization: `Bearer ${accessToken}` }
      })
      return res.ok
    } catch {
      return false
    }
  }
}
