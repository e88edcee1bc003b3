/**
 * @license MIT
 * @copyright Copyright (c) 2025, GoldFrite
 */

import type { MicrosoftToken, XboxLiveAuthResponse } from './auth'

/**
 * The error class for the library.
 */
export class LauncherKitError extends Error {
  code: ErrorCode

  constructor(code: ErrorCode, message: string) {
    super(message)
    this.name = 'LauncherKitError'
    this.code = code
  }
}

export const ErrorType = {
  AUTH_ERROR: 'AUTH_ERROR',
  AUTH_CANCELLED: 'AUTH_CANCELLED',
  AUTH_TIMEOUT: 'AUTH_TIMEOUT',
  NO_AUTHORIZATION_CODE: 'NO_AUTHORIZATION_CODE',
  MICROSOFT_AUTH_ERROR: 'MICROSOFT_AUTH_ERROR',
  XBOX_LIVE_AUTH_ERROR: 'XBOX_LIVE_AUTH_ERROR',
  XSTS_ERROR: 'XSTS_ERROR',
  MINECRAFT_BEARER_ERROR: 'MINECRAFT_BEARER_ERROR',
  CACHE_ERROR: 'CACHE_ERROR',
  FILE_ERROR: 'FILE_ERROR',
  INSTANCE_ERROR: 'INSTANCE_ERROR',
  INSTANCE_NOT_FOUND: 'INSTANCE_NOT_FOUND',
  NET_ERROR: 'NET_ERROR',
  EXEC_ERROR: 'EXEC_ERROR'
} as const

export type ErrorCode =
  | typeof ErrorType.AUTH_ERROR
  | typeof ErrorType.AUTH_CANCELLED
  | typeof ErrorType.AUTH_TIMEOUT
  | typeof ErrorType.NO_AUTHORIZATION_CODE
  | typeof ErrorType.MICROSOFT_AUTH_ERROR
  | typeof ErrorType.XBOX_LIVE_AUTH_ERROR
  | typeof ErrorType.XSTS_ERROR
  | typeof ErrorType.MINECRAFT_BEARER_ERROR
  | typeof ErrorType.CACHE_ERROR
  | typeof ErrorType.FILE_ERROR
  | typeof ErrorType.INSTANCE_ERROR
  | typeof ErrorType.INSTANCE_NOT_FOUND
  | typeof ErrorType.NET_ERROR
  | typeof ErrorType.EXEC_ERROR

/**
 * Thrown when the Microsoft token endpoint rejects an authorization code.
 */
export class MicrosoftAuthenticationError extends LauncherKitError {
  readonly clientId: string
  readonly authorizationCode: string
  readonly responseBody: string

  constructor(clientId: string, authorizationCode: string, responseBody: string, message = 'Unable to get the Microsoft access token from server') {
    super(ErrorType.MICROSOFT_AUTH_ERROR, `${message}. Client ID: '${clientId}'\nResponse Body:\n${responseBody}`)
    this.name = 'MicrosoftAuthenticationError'
    this.clientId = clientId
    this.authorizationCode = authorizationCode
    this.responseBody = responseBody
  }
}

/**
 * Thrown when Xbox Live refuses the Microsoft access token.
 */
export class XboxLiveAuthenticationError extends LauncherKitError {
  readonly microsoftToken: MicrosoftToken
  readonly responseBody: string

  constructor(microsoftToken: MicrosoftToken, responseBody: string, message = 'Unable to get the Xbox Live authentication token from server') {
    super(ErrorType.XBOX_LIVE_AUTH_ERROR, `${message}\nResponse Body:\n${responseBody}`)
    this.name = 'XboxLiveAuthenticationError'
    this.microsoftToken = microsoftToken
    this.responseBody = responseBody
  }
}

/**
 * Thrown when XSTS refuses the Xbox Live token.
 *
 * `xerr` holds the `XErr` code of the response when the server sent one (eg. `2148916233` when the
 * Microsoft account has no Xbox profile).
 */
export class XSTSError extends LauncherKitError {
  readonly xboxLiveAuth: XboxLiveAuthResponse
  readonly responseBody: string
  readonly xerr: number | null

  constructor(xboxLiveAuth: XboxLiveAuthResponse, responseBody: string, xerr: number | null = null, message = 'Unable to get the XSTS authentication token from server') {
    super(ErrorType.XSTS_ERROR, `${message}${xerr !== null ? ` (XErr ${xerr})` : ''}\nResponse Body:\n${responseBody}`)
    this.name = 'XSTSError'
    this.xboxLiveAuth = xboxLiveAuth
    this.responseBody = responseBody
    this.xerr = xerr
  }
}

/**
 * Thrown when Minecraft services refuse the XSTS token.
 */
export class MinecraftBearerError extends LauncherKitError {
  readonly xstsToken: string
  readonly responseBody: string

  constructor(xstsToken: string, responseBody: string, message = 'Unable to get the Minecraft bearer token from server') {
    super(ErrorType.MINECRAFT_BEARER_ERROR, `${message}\nResponse Body:\n${responseBody}`)
    this.name = 'MinecraftBearerError'
    this.xstsToken = xstsToken
    this.responseBody = responseBody
  }
}

/**
 * Thrown when the OAuth redirect reached the listener without any query string.
 */
export class NoAuthorizationCodeError extends LauncherKitError {
  readonly redirectUri: string

  constructor(redirectUri: string) {
    super(ErrorType.NO_AUTHORIZATION_CODE, `The redirect to ${redirectUri} carried no authorization code`)
    this.name = 'NoAuthorizationCodeError'
    this.redirectUri = redirectUri
  }
}
