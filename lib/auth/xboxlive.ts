/**
 * @license MIT
 * @copyright Copyright (c) 2025, GoldFrite
 */

import type { AuthOptions, Fetch, MicrosoftToken, XboxLiveAuthResponse } from '../../types/auth'
import { XboxLiveAuthenticationError } from '../../types/errors'
import { jsonHeaders, parseJson, send } from '../utils/http'
import { XBOX_LIVE_AUTH_URL, XBOX_LIVE_RELYING_PARTY } from './constants'
import { xboxLiveAuthSchema } from './schemas'

export default class XboxLiveExchange {
  private readonly fetch: Fetch

  constructor(fetch: Fetch) {
    this.fetch = fetch
  }

  /**
   * Exchange a Microsoft access token for an Xbox Live user token.
   * @throws {XboxLiveAuthenticationError} If Xbox Live refuses the token.
   */
  async authenticate(microsoftToken: MicrosoftToken, options: AuthOptions = {}): Promise<XboxLiveAuthResponse> {
    const res = await send(this.fetch, XBOX_LIVE_AUTH_URL, {
      method: 'POST',
      headers: jsonHeaders(),
      body: JSON.stringify({
        Properties: {
          AuthMethod: 'RPS',
          SiteName: 'user.auth.xboxlive.com',
          RpsTicket: 'd=' + microsoftToken.access_token
        },
        RelyingParty: XBOX_LIVE_RELYING_PARTY,
        TokenType: 'JWT'
      }),
      signal: options.signal
    })

    if (!res.ok) throw new XboxLiveAuthenticationError(microsoftToken, res.body)

    const auth = parseJson(res.body, xboxLiveAuthSchema)
    if (!auth) throw new XboxLiveAuthenticationError(microsoftToken, res.body, 'Unexpected response from Xbox Live')

    return auth
  }
}
