/**
 * @license MIT
 * @copyright Copyright (c) 2025, GoldFrite
 */

import MicrosoftAuth from './lib/auth/microsoft'
import MicrosoftTokenExchange from './lib/auth/microsofttoken'
import XboxLiveExchange from './lib/auth/xboxlive'
import XSTSExchange from './lib/auth/xsts'
import MinecraftTokenExchange from './lib/auth/minecrafttoken'
import MinecraftServices from './lib/auth/services'
import TokenCache from './lib/auth/tokencache'
import InstanceStore from './lib/instances/instances'
import LoopbackRedirectReceiver from './lib/utils/redirect'
import openBrowser from './lib/utils/browser'

export {
  MicrosoftAuth,
  MicrosoftTokenExchange,
  XboxLiveExchange,
  XSTSExchange,
  MinecraftTokenExchange,
  MinecraftServices,
  TokenCache,
  InstanceStore,
  LoopbackRedirectReceiver,
  openBrowser
}
export default { MicrosoftAuth, TokenCache, InstanceStore }

export { createPkcePair, generateCodeChallenge, generateCodeVerifier } from './lib/auth/pkce'
export * from './types/errors'
export type * from './types/auth'
export type * from './types/config'
export type * from './types/events'
export type * from './types/instance'
