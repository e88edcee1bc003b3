import net from 'node:net'
import { afterEach, describe, expect, it } from 'vitest'
import LoopbackRedirectReceiver from '../lib/utils/redirect'
import { ErrorType, NoAuthorizationCodeError } from '../types/errors'

function rawRequest(port: number, request: string) {
  return new Promise<string>((resolve, reject) => {
    let data = ''
    const socket = net.connect(port, '127.0.0.1', () => socket.write(request))
    socket.setEncoding('utf-8')
    socket.on('data', (chunk: string) => (data += chunk))
    socket.on('end', () => resolve(data))
    socket.on('error', reject)
  })
}

describe('LoopbackRedirectReceiver', () => {
  let receiver: LoopbackRedirectReceiver

  afterEach(async () => {
    await receiver.close()
  })

  async function start() {
    receiver = new LoopbackRedirectReceiver('http://127.0.0.1:0/callback')
    await receiver.listen()
    return `http://127.0.0.1:${receiver.port}`
  }

  it('returns the query string of the redirect and stops listening', async () => {
    const base = await start()

    const res = await fetch(`${base}/callback?code=test-code&state=test-state`)
    expect(res.status).toBe(200)
    await res.text()

    expect(await receiver.waitForQuery({ timeout: 1000 })).toBe('code=test-code&state=test-state')
    expect(receiver.port).toBeNull()
  })

  it('ignores requests to other paths', async () => {
    const base = await start()

    const favicon = await fetch(`${base}/favicon.ico`)
    expect(favicon.status).toBe(404)
    await favicon.text()

    const pending = receiver.waitForQuery({ timeout: 1000 })
    const res = await fetch(`${base}/callback?code=test-code`)
    await res.text()

    expect(await pending).toBe('code=test-code')
  })

  it('answers 400 to a request target that is not a URL and keeps listening', async () => {
    const base = await start()

    const response = await rawRequest(receiver.port ?? 0, 'GET http://[ HTTP/1.1\r\nHost: 127.0.0.1\r\n\r\n')
    expect(response.split('\r\n')[0]).toBe('HTTP/1.1 400 Bad Request')

    const pending = receiver.waitForQuery({ timeout: 1000 })
    const res = await fetch(`${base}/callback?code=test-code`)
    await res.text()

    expect(await pending).toBe('code=test-code')
  })

  it('listens on 127.0.0.1 for a localhost redirect URI', async () => {
    receiver = new LoopbackRedirectReceiver('http://localhost:0/callback')
    await receiver.listen()

    const pending = receiver.waitForQuery({ timeout: 1000 })
    const res = await fetch(`http://127.0.0.1:${receiver.port}/callback?code=test-code`)
    await res.text()

    expect(await pending).toBe('code=test-code')
  })

  it('fails with NoAuthorizationCodeError when the redirect has no query string', async () => {
    const base = await start()

    const res = await fetch(`${base}/callback`)
    await res.text()

    await expect(receiver.waitForQuery({ timeout: 1000 })).rejects.toBeInstanceOf(NoAuthorizationCodeError)
    expect(receiver.port).toBeNull()
  })

  it('times out', async () => {
    await start()

    await expect(receiver.waitForQuery({ timeout: 20 })).rejects.toMatchObject({ code: ErrorType.AUTH_TIMEOUT })
    expect(receiver.port).toBeNull()
  })

  it('can be cancelled', async () => {
    await start()
    const controller = new AbortController()

    const pending = receiver.waitForQuery({ timeout: 0, signal: controller.signal })
    controller.abort()

    await expect(pending).rejects.toMatchObject({ code: ErrorType.AUTH_CANCELLED })
  })

  it('only accepts http redirect URIs', () => {
    receiver = new LoopbackRedirectReceiver('http://127.0.0.1:0/callback')
    expect(() => new LoopbackRedirectReceiver('https://example.com/callback')).toThrow('must use http://')
  })
})
