// src/gateway/server.ts — Hono HTTP app with encrypted-URL routes

import { randomInt } from "node:crypto"
import { Type } from "@sinclair/typebox"
import { Hono } from "hono"
import type { UrlCryptoConfig } from "../config.js"
import type { UrlTransformer } from "../url/transformer.js"
import { Encrypted, FromQuery } from "../url/shape.js"
import { decryptedQuery, queryDecryption } from "./url-crypto.js"
import type { UrlCryptoEnv } from "./url-crypto.js"

export interface AppOptions {
  transformer: UrlTransformer
  /** Order id generator for POST /orders (default: random 6-digit id) */
  nextOrderId?: () => string
}

/** Customer lookup: lastName must arrive encrypted, dateOfBirth may arrive either way. */
export const CustomerQuery = Type.Object({
  lastName: Encrypted(Type.String()),
  firstName: Type.Optional(Type.String()),
  dateOfBirth: Type.Optional(FromQuery("dob", Encrypted(Type.String(), { ignoreWarning: true }))),
})

export function createApp(config: UrlCryptoConfig, options: AppOptions) {
  const app = new Hono<UrlCryptoEnv>()
  const { transformer } = options
  const nextOrderId = options.nextOrderId ?? (() => String(randomInt(100_000, 1_000_000)))

  app.get("/health", (c) =>
    c.json({
      status: "healthy",
      uptime: process.uptime(),
      query_phase: config.query.phase,
      outbound: transformer.outboundEnabled,
    }),
  )

  // Path segment was decrypted before routing
  app.get("/orders/:id", (c) => c.json({ id: c.req.param("id") }))

  app.post("/orders", (c) => c.redirect(`/orders/${nextOrderId()}`, 303))

  app.get("/customers", queryDecryption(transformer, CustomerQuery), (c) =>
    c.json({
      lastName: decryptedQuery(c, "lastName") ?? null,
      firstName: decryptedQuery(c, "firstName") ?? null,
      dateOfBirth: decryptedQuery(c, "dob") ?? null,
    }),
  )

  // Encrypted link for an order, e.g. for embedding in a page or email
  app.get("/links/orders/:id", async (c) => {
    const href = await transformer.protectPath(`/orders/${c.req.param("id")}`, (_segment, index) => index === 1)
    return c.json({ href })
  })

  return app
}
