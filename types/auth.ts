/**
 * Transport used by every exchange. Defaults to the global `fetch`.
 */
export type Fetch = (input: string | URL | Request, init?: RequestInit) => Promise<Response>

export interface PkcePair {
  /** 128 characters from the unreserved URI alphabet. */
  codeVerifier: string
  /** `base64url(SHA256(codeVerifier))` without padding. */
  codeChallenge: string
}

/**
 * Response of the Microsoft token endpoint, kept with its wire field names so that it can be
 * persisted as returned.
 */
export interface MicrosoftToken {
  access_token: string
  refresh_token: string
  /** Lifetime of the access token, in seconds */
  expires_in: number
  token_type?: string
  scope?: string
  user_id?: string
}

export interface XboxLiveAuthResponse {
  token: string
  displayClaims: {
    /** The first entry carries the user hash (UHS) of the player */
    xui: { uhs: string }[]
  }
  issueInstant?: string
  notAfter?: string
}

export interface MinecraftProfile {
  /** UUID of the account (hexadecimal string without dashes) */
  id: string
  name: string
  skins?: { id: string; state: string; url: string; variant?: string }[]
  capes?: { id: string; state: string; url: string; alias?: string }[]
}

export interface Account {
  name: string
  uuid: string
  /** Minecraft bearer token */
  accessToken: string
  /** Microsoft refresh token, kept in the token cache as well */
  refreshToken?: string
  meta: { online: boolean; type: 'msa' }
}

/**
 * Single-shot receiver of the OAuth redirect.
 */
export interface RedirectReceiver {
  /**
   * Start listening on the redirect URI. Resolves once requests can be accepted.
   */
  listen(): Promise<void>
  /**
   * Wait for the redirect and return its query string (without the leading `?`). The receiver is
   * closed once this settles.
   */
  waitForQuery(options: { timeout: number; signal?: AbortSignal }): Promise<string>
  close(): Promise<void>
}

export interface AuthOptions {
  /** Cancels the authentication, including the wait for the browser redirect. */
  signal?: AbortSignal
}
