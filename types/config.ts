import type { Fetch, RedirectReceiver } from './auth'

export interface MicrosoftAuthConfig {
  /**
   * Your Azure application's client ID. The application must allow public client flows and list
   * `redirectUri` as a mobile/desktop redirect URI.
   */
  clientId: string
  /**
   * The loopback URI the browser is redirected to after login (eg. `'http://127.0.0.1:25585/callback'`).
   * Prefer `127.0.0.1` to `localhost`: a `localhost` URI is listened on at `127.0.0.1` only, not `::1`.
   */
  redirectUri: string
  /**
   * [Optional: default is `'msa-auth.json'`] The file where the Microsoft token is cached between
   * sessions. Relative paths are resolved from the working directory.
   */
  cacheFile?: string
  /**
   * [Optional: default is `300000` (5 minutes)] How long to wait for the browser redirect, in
   * milliseconds. `0` waits forever (cancel with an `AbortSignal`).
   */
  timeout?: number
  /**
   * [Optional: default is the global `fetch`] The HTTP transport.
   */
  fetch?: Fetch
  /**
   * [Optional: default opens the system browser] Opens the authorize URL.
   */
  openBrowser?: (url: string) => Promise<void>
  /**
   * [Optional: default is a loopback HTTP listener] Creates the receiver of the OAuth redirect.
   */
  createRedirectReceiver?: (redirectUri: string) => RedirectReceiver
}

export type FullMicrosoftAuthConfig = Required<MicrosoftAuthConfig>

export interface InstanceStoreConfig {
  /**
   * The folder holding one sub-folder per instance. Created if missing.
   */
  root: string
}
