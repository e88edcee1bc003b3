/**
 * @license MIT
 * @copyright Copyright (c) 2025, GoldFrite
 */

export const MICROSOFT_AUTHORIZE_URL = 'https://login.live.com/oauth20_authorize.srf'
export const MICROSOFT_TOKEN_URL = 'https://login.live.com/oauth20_token.srf'
export const XBOX_LIVE_AUTH_URL = 'https://user.auth.xboxlive.com/user/authenticate'
export const XSTS_AUTH_URL = 'https://xsts.auth.xboxlive.com/xsts/authorize'
export const MINECRAFT_LOGIN_URL = 'https://api.minecraftservices.com/authentication/login_with_xbox'
export const MINECRAFT_PROFILE_URL = 'https://api.minecraftservices.com/minecraft/profile'
export const MINECRAFT_ENTITLEMENTS_URL = 'https://api.minecraftservices.com/entitlements/mcstore'

export const MICROSOFT_SCOPE = 'XboxLive.signin offline_access'
export const MICROSOFT_COBRAND_ID = '8058f65d-ce06-4c30-9559-473c9275a65d'

export const XBOX_LIVE_RELYING_PARTY = 'http://auth.xboxlive.com'
export const MINECRAFT_RELYING_PARTY = 'rp://api.minecraftservices.com/'

export const DEFAULT_CACHE_FILE = 'msa-auth.json'
export const DEFAULT_REDIRECT_TIMEOUT = 5 * 60 * 1000

/**
 * Known `XErr` codes returned by XSTS.
 */
export const XSTS_ERRORS: Record<number, string> = {
  2148916227: 'The account is banned from Xbox',
  2148916233: 'The Microsoft account has no Xbox profile, create one on xbox.com first',
  2148916235: 'Xbox Live is not available in the country of the account',
  2148916236: 'The account needs adult verification (South Korea)',
  2148916237: 'The account needs adult verification (South Korea)',
  2148916238: 'The account belongs to a child and must be added to a Family by an adult'
}
