import fs from 'node:fs/promises'
import path_ from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import TokenCache from '../lib/auth/tokencache'
import { ErrorType, LauncherKitError } from '../types/errors'
import { tempDir } from './helpers'

describe('TokenCache', () => {
  let dir: string
  let cache: TokenCache

  beforeEach(async () => {
    dir = await tempDir()
    cache = new TokenCache(path_.join(dir, 'msa-auth.json'))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it('returns null when there is no cache file', async () => {
    expect(cache.exists()).toBe(false)
    expect(await cache.load()).toBeNull()
  })

  it('keeps every field returned by the identity provider', async () => {
    await fs.writeFile(cache.file, JSON.stringify({ access_token: 'a', refresh_token: 'r', expires_in: 60, foci: '1' }))

    const loaded = await cache.load()
    expect(loaded).toEqual({ access_token: 'a', refresh_token: 'r', expires_in: 60, foci: '1' })

    if (!loaded) throw new Error('expected a token')
    await cache.store(loaded)
    expect(JSON.parse(await fs.readFile(cache.file, 'utf-8'))).toEqual({ access_token: 'a', refresh_token: 'r', expires_in: 60, foci: '1' })
  })

  it('overwrites the previous token', async () => {
    await cache.store({ access_token: 'first', refresh_token: 'r1', expires_in: 3600 })
    await cache.store({ access_token: 'second', refresh_token: 'r2', expires_in: 3600 })

    expect(JSON.parse(await fs.readFile(cache.file, 'utf-8'))).toEqual({ access_token: 'second', refresh_token: 'r2', expires_in: 3600 })
  })

  it('creates missing parent folders', async () => {
    const nested = new TokenCache(path_.join(dir, 'a', 'b', 'msa-auth.json'))
    await nested.store({ access_token: 'test-access', refresh_token: 'test-refresh', expires_in: 3600 })
    expect(nested.exists()).toBe(true)
  })

  it('fails with CACHE_ERROR on a malformed file', async () => {
    await fs.writeFile(cache.file, '{ not json')
    await expect(cache.load()).rejects.toMatchObject({ code: ErrorType.CACHE_ERROR })
    await expect(cache.load()).rejects.toBeInstanceOf(LauncherKitError)
  })

  it('fails with CACHE_ERROR on a file without refresh token', async () => {
    await fs.writeFile(cache.file, JSON.stringify({ access_token: 'a', expires_in: 60 }))
    await expect(cache.load()).rejects.toMatchObject({ code: ErrorType.CACHE_ERROR })
  })

  it('clears the cache', async () => {
    await cache.store({ access_token: 'test-access', refresh_token: 'test-refresh', expires_in: 3600 })
    await cache.clear()
    expect(cache.exists()).toBe(false)
    await cache.clear()
  })
})
