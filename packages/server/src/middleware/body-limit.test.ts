import { describe, it, expect } from 'vitest'
import { Hono } from 'hono'
import { createBodyLimit, DEFAULT_MAX_SIZE } from './body-limit.js'

describe('createBodyLimit', () => {
  function createApp(maxSize?: number) {
    const app = new Hono()
    app.post('/upload', createBodyLimit(maxSize), async (c) => {
      await c.req.json()
      return c.json({ ok: true }, 200)
    })
    return app
  }

  it('request within limit passes through with 200', async () => {
    const app = createApp(1024)
    const body = JSON.stringify({ hello: 'world' })
    const res = await app.request('/upload', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'Content-Length': String(body.length) },
      body,
    })
    expect(res.status).toBe(200)
    const json = await res.json()
    expect(json.ok).toBe(true)
  })

  it('request exceeding limit returns 413 with error JSON', async () => {
    const maxSize = 16
    const app = createApp(maxSize)
    const body = JSON.stringify({ data: 'x'.repeat(100) })
    const res = await app.request('/upload', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'Content-Length': String(body.length) },
      body,
    })
    expect(res.status).toBe(413)
    const json = await res.json()
    expect(json.error).toEqual({
      code: 413,
      errorCode: 'CONTENT_TOO_LARGE',
      message: 'Content too large',
      details: { maxSize },
    })
  })

  it('defaults to the 64 KB limit', async () => {
    expect(DEFAULT_MAX_SIZE).toBe(65536)

    const app = createApp()
    const body = JSON.stringify({ data: 'x'.repeat(DEFAULT_MAX_SIZE) })
    const res = await app.request('/upload', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'Content-Length': String(body.length) },
      body,
    })
    expect(res.status).toBe(413)
  })
})
