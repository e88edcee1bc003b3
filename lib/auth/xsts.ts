/**
 * @license MIT
 * @copyright Copyright (c) 2025, GoldFrite
 */

import type { AuthOptions, Fetch, XboxLiveAuthResponse } from '../../types/auth'
import { XSTSError } from '../../types/errors'
import { jsonHeaders, parseJson, send } from '../utils/http'
import { MINECRAFT_RELYING_PARTY, XSTS_AUTH_URL, XSTS_ERRORS } from './constants'
import { xstsErrorSchema, xstsSchema } from './schemas'

export default class XSTSExchange {
  private readonly fetch: Fetch

  constructor(fetch: Fetch) {
    this.fetch = fetch
  }

  /**
   * Exchange an Xbox Live token for an XSTS token scoped to Minecraft services.
   * @returns The XSTS token.
   * @throws {XSTSError} If XSTS refuses the token. Check `xerr` for the reason.
   */
  async authorize(xboxLiveAuth: XboxLiveAuthResponse, options: AuthOptions = {}): Promise<string> {
    const res = await send(this.fetch, XSTS_AUTH_URL, {
      method: 'POST',
      headers: jsonHeaders(),
      body: JSON.stringify({
        Properties: {
          SandboxId: 'RETAIL',
          UserTokens: [xboxLiveAuth.token]
        },
        RelyingParty: MINECRAFT_RELYING_PARTY,
        TokenType: 'JWT'
      }),
      signal: options.signal
    })

    if (!res.ok) {
      const xerr = parseJson(res.body, xstsErrorSchema)?.XErr ?? null
      const reason = xerr !== null ? XSTS_ERRORS[xerr] : undefined
      throw new XSTSError(xboxLiveAuth, res.body, xerr, reason)
    }

    const xsts = parseJson(res.body, xstsSchema)
    if (!xsts) throw new XSTSError(xboxLiveAuth, res.body, null, 'Unexpected response from XSTS')

    return xsts.Token
  }
}
