// tests/gateway/url-crypto.test.ts — Fetch wrapper and query middleware against a Hono app

import { describe, it, expect } from "vitest"
import { Hono } from "hono"
import { createApp } from "../../src/gateway/server.js"
import { createUrlTransformer, decryptedQueries, decryptedQuery, withUrlDecryption } from "../../src/gateway/url-crypto.js"
import type { UrlCryptoEnv } from "../../src/gateway/url-crypto.js"
import type { Env } from "../../src/config.js"
import { fakeLogger, PATH_PURPOSE, QUERY_PURPOSE, testConfig, testProvider } from "../helpers/fixtures.js"

const provider = testProvider()
const pathProtector = provider.createProtector(PATH_PURPOSE)
const queryProtector = provider.createProtector(QUERY_PURPOSE)

function gateway(env: Env = {}) {
  const config = testConfig(env)
  const logger = fakeLogger()
  const transformer = createUrlTransformer(config, logger)
  const app = createApp(config, { transformer, nextOrderId: () => "1001" })
  return { handler: withUrlDecryption(app, transformer), logger }
}

function get(path: string): Request {
  return new Request(`http://localhost${path}`)
}

// ---------------------------------------------------------------------------
// Path decryption before routing
// ---------------------------------------------------------------------------

describe("withUrlDecryption: path", () => {
  it("routes an encrypted id segment to its plaintext route", async () => {
    const { handler } = gateway()
    const token = await pathProtector.protect("42")
    const res = await handler.fetch(get(`/orders/${token}`))
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ id: "42" })
  })

  it("routes plaintext segments unchanged", async () => {
    const { handler } = gateway()
    const res = await handler.fetch(get("/orders/42"))
    expect(await res.json()).toEqual({ id: "42" })
  })

  it("decrypts a static segment so the route matches", async () => {
    const { handler } = gateway()
    const token = await pathProtector.protect("orders")
    const res = await handler.fetch(get(`/${token}/7`))
    expect(await res.json()).toEqual({ id: "7" })
  })

  it("leaves the query string alone in the post-routing phase", async () => {
    const app = new Hono()
    app.get("/echo", (c) => c.json({ search: new URL(c.req.url).search }))
    const wrapped = withUrlDecryption(app, createUrlTransformer(testConfig()))
    const token = await queryProtector.protect("Doe")
    const res = await wrapped.fetch(get(`/echo?lastName=${token}`))
    expect(await res.json()).toEqual({ search: `?lastName=${token}` })
  })
})

// ---------------------------------------------------------------------------
// Query decryption after routing
// ---------------------------------------------------------------------------

describe("queryDecryption: post-routing", () => {
  it("decrypts the encrypted field and keeps plaintext fields, without warning", async () => {
    const { handler, logger } = gateway()
    const token = await queryProtector.protect("Doe")
    const res = await handler.fetch(get(`/customers?lastName=${token}&firstName=John`))
    expect(await res.json()).toEqual({ lastName: "Doe", firstName: "John", dateOfBirth: null })
    expect(logger.warn).not.toHaveBeenCalled()
  })

  it("passes an unencrypted value through and warns once, naming the key", async () => {
    const { handler, logger } = gateway()
    const res = await handler.fetch(get("/customers?lastName=plaintext-garbage"))
    expect(await res.json()).toEqual({ lastName: "plaintext-garbage", firstName: null, dateOfBirth: null })
    expect(logger.warn).toHaveBeenCalledTimes(1)
    expect(logger.warn).toHaveBeenCalledWith("[url-crypto] query parameters failed to decrypt", {
      parameters: ["lastName"],
    })
  })

  it("reads a field under its wire name and tolerates plaintext when marked", async () => {
    const { handler, logger } = gateway()
    const lastName = await queryProtector.protect("Doe")
    const dob = await queryProtector.protect("1990-01-01")

    const encrypted = await handler.fetch(get(`/customers?lastName=${lastName}&dob=${dob}`))
    expect(await encrypted.json()).toEqual({ lastName: "Doe", firstName: null, dateOfBirth: "1990-01-01" })

    const plain = await handler.fetch(get(`/customers?lastName=${lastName}&dob=1990-01-01`))
    expect(await plain.json()).toEqual({ lastName: "Doe", firstName: null, dateOfBirth: "1990-01-01" })
    expect(logger.warn).not.toHaveBeenCalled()
  })

  it("adds the failure reasons when error details are enabled", async () => {
    const { handler, logger } = gateway({ URL_CRYPTO_SHOW_ERROR_DETAILS: "true" })
    await handler.fetch(get("/customers?lastName=Doe"))
    expect(logger.warn.mock.calls[0][1]).toEqual({
      parameters: ["lastName"],
      errors: { lastName: expect.stringContaining("INVALID_CIPHERTEXT") },
    })
  })
})

describe("queryDecryption: pre-routing", () => {
  it("decrypts every query value greedily before routing", async () => {
    const { handler, logger } = gateway({ URL_CRYPTO_QUERY_PHASE: "pre-routing" })
    const lastName = await queryProtector.protect("Doe")
    const firstName = await queryProtector.protect("John")
    const res = await handler.fetch(get(`/customers?lastName=${lastName}&firstName=${firstName}`))
    expect(await res.json()).toEqual({ lastName: "Doe", firstName: "John", dateOfBirth: null })
    expect(logger.warn).not.toHaveBeenCalled()
  })

  it("never warns about plaintext values", async () => {
    const { handler, logger } = gateway({ URL_CRYPTO_QUERY_PHASE: "pre-routing" })
    const res = await handler.fetch(get("/customers?lastName=Doe"))
    expect(await res.json()).toEqual({ lastName: "Doe", firstName: null, dateOfBirth: null })
    expect(logger.warn).not.toHaveBeenCalled()
  })
})

// ---------------------------------------------------------------------------
// Outbound Location
// ---------------------------------------------------------------------------

describe("withUrlDecryption: outbound Location", () => {
  it("re-encrypts matching segments of a same-origin redirect", async () => {
    const { handler } = gateway({ URL_CRYPTO_OUTBOUND_SEGMENTS: "^\\d+$" })
    const res = await handler.fetch(new Request("http://localhost/orders", { method: "POST" }))
    expect(res.status).toBe(303)

    const location = res.headers.get("Location") ?? ""
    expect(location.startsWith("/orders/")).toBe(true)
    expect(location).not.toBe("/orders/1001")

    const followed = await handler.fetch(get(location))
    expect(await followed.json()).toEqual({ id: "1001" })
  })

  it("leaves the Location alone when the outbound transform is off", async () => {
    const { handler } = gateway()
    const res = await handler.fetch(new Request("http://localhost/orders", { method: "POST" }))
    expect(res.headers.get("Location")).toBe("/orders/1001")
  })

  it("leaves a cross-origin Location alone", async () => {
    const app = new Hono()
    app.get("/away", (c) => c.redirect("https://example.com/orders/1001", 302))
    const transformer = createUrlTransformer(testConfig({ URL_CRYPTO_OUTBOUND_SEGMENTS: "^\\d+$" }))
    const res = await withUrlDecryption(app, transformer).fetch(get("/away"))
    expect(res.headers.get("Location")).toBe("https://example.com/orders/1001")
  })

  it("passes an unparseable Location through without failing the request", async () => {
    const app = new Hono()
    app.get("/broken", () => new Response(null, { status: 302, headers: { Location: "http://[bad" } }))
    const transformer = createUrlTransformer(testConfig({ URL_CRYPTO_OUTBOUND_SEGMENTS: "^\\d+$" }))
    const res = await withUrlDecryption(app, transformer).fetch(get("/broken"))
    expect(res.status).toBe(302)
    expect(res.headers.get("Location")).toBe("http://[bad")
  })

  it("keeps an absolute same-origin Location absolute", async () => {
    const app = new Hono()
    app.get("/self", (c) => c.redirect("http://localhost/orders/1001?x=1", 302))
    const transformer = createUrlTransformer(testConfig({ URL_CRYPTO_OUTBOUND_SEGMENTS: "^\\d+$" }))
    const res = await withUrlDecryption(app, transformer).fetch(get("/self"))
    const location = new URL(res.headers.get("Location") ?? "")
    expect(location.origin).toBe("http://localhost")
    expect(location.search).toBe("?x=1")
    expect(await transformer.decryptPath(location.pathname)).toBe("/orders/1001")
  })
})

// ---------------------------------------------------------------------------
// Accessors
// ---------------------------------------------------------------------------

describe("decryptedQuery / decryptedQueries", () => {
  it("fall back to the raw query when the middleware did not run", async () => {
    const app = new Hono<UrlCryptoEnv>()
    app.get("/raw", (c) => c.json({ one: decryptedQuery(c, "tag") ?? null, all: decryptedQueries(c, "tag") ?? null }))
    const res = await app.request("/raw?tag=a&tag=b")
    expect(await res.json()).toEqual({ one: "a", all: ["a", "b"] })
  })

  it("return undefined for a missing key", async () => {
    const app = new Hono<UrlCryptoEnv>()
    app.get("/raw", (c) => c.json({ missing: decryptedQuery(c, "nope") === undefined }))
    const res = await app.request("/raw")
    expect(await res.json()).toEqual({ missing: true })
  })
})
