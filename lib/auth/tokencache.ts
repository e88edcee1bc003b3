/**
 * @license MIT
 * @copyright Copyright (c) 2025, GoldFrite
 */

import fs from 'node:fs/promises'
import { existsSync } from 'node:fs'
import path_ from 'node:path'
import type { MicrosoftToken } from '../../types/auth'
import { LauncherKitError, ErrorType } from '../../types/errors'
import { microsoftTokenSchema } from './schemas'
import { parseJson } from '../utils/http'

/**
 * Stores the last Microsoft token in a single JSON file.
 */
export default class TokenCache {
  readonly file: string

  /**
   * @param file Path to the cache file.
   */
  constructor(file: string) {
    this.file = path_.resolve(file)
  }

  exists() {
    return existsSync(this.file)
  }

  /**
   * Read the cached token.
   * @returns The token, or `null` if there is no cache file.
   * @throws {LauncherKitError} `CACHE_ERROR` if the file cannot be read or does not hold a token.
   */
  async load(): Promise<MicrosoftToken | null> {
    if (!this.exists()) return null

    let content: string
    try {
      content = await fs.readFile(this.file, 'utf-8')
    } catch (err: unknown) {
      throw new LauncherKitError(ErrorType.CACHE_ERROR, `Unable to read the token cache ${this.file}: ${err instanceof Error ? err.message : err}`)
    }

    const token = parseJson(content, microsoftTokenSchema)
    if (!token) throw new LauncherKitError(ErrorType.CACHE_ERROR, `The token cache ${this.file} does not hold a Microsoft token`)
    return token
  }

  /**
   * Overwrite the cache with a token.
   */
  async store(token: MicrosoftToken) {
    try {
      await fs.mkdir(path_.dirname(this.file), { recursive: true })
      await fs.writeFile(this.file, JSON.stringify(token), 'utf-8')
    } catch (err: unknown) {
      throw new LauncherKitError(ErrorType.CACHE_ERROR, `Unable to write the token cache ${this.file}: ${err instanceof Error ? err.message : err}`)
    }
  }

  /**
   * Delete the cache file, if any.
   */
  async clear() {
    await fs.rm(this.file, { force: true })
  }
}
