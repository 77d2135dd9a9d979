// src/gateway/url-crypto.ts — Hono integration for URL decryption
//
// Two phases:
// - withUrlDecryption() wraps app.fetch and rewrites the path (and, in the
//   pre-routing query phase, the query string) before Hono routes the request.
//   On the way out it re-encrypts a same-origin Location header.
// - queryDecryption() is route middleware. It runs after routing, when the
//   route's target shape is known, and stores the decrypted query in the
//   context variable `decryptedQuery`.

import type { TSchema } from "@sinclair/typebox"
import type { Context, MiddlewareHandler } from "hono"
import type { UrlCryptoConfig } from "../config.js"
import { DataProtectionProvider } from "../crypto/protector.js"
import { parseQuery, serializeQuery } from "../url/query-strategy.js"
import type { QueryLogger, QueryMap } from "../url/query-strategy.js"
import { UrlTransformer } from "../url/transformer.js"

export type UrlCryptoEnv = {
  Variables: {
    decryptedQuery: QueryMap
  }
}

export interface FetchApp {
  fetch(request: Request): Response | Promise<Response>
}

export function createUrlTransformer(config: UrlCryptoConfig, logger?: QueryLogger): UrlTransformer {
  const provider = new DataProtectionProvider({ secret: config.crypto.secret })
  const pattern = config.outbound.segmentPattern
  return new UrlTransformer(provider, {
    pathPurpose: config.crypto.pathPurpose,
    queryPurpose: config.crypto.queryPurpose,
    queryPhase: config.query.phase,
    ignoreUnencryptedWarnings: config.query.ignoreUnencryptedWarnings,
    showErrorDetails: config.query.showErrorDetails,
    outboundSegments: pattern ? (segment) => pattern.test(segment) : undefined,
    logger,
  })
}

// ---------------------------------------------------------------------------
// Pre-routing: fetch wrapper
// ---------------------------------------------------------------------------

const SCHEME = /^[a-z][a-z0-9+.-]*:/i

async function encryptLocation(response: Response, requestUrl: URL, transformer: UrlTransformer): Promise<Response> {
  if (!transformer.outboundEnabled) return response
  const location = response.headers.get("Location")
  // Unparseable targets go out as the app wrote them
  if (!location || !URL.canParse(location, requestUrl.href)) return response

  const target = new URL(location, requestUrl)
  if (target.origin !== requestUrl.origin) return response
  target.pathname = await transformer.transformOutbound(target.pathname)

  const headers = new Headers(response.headers)
  headers.set(
    "Location",
    SCHEME.test(location) ? target.toString() : target.pathname + target.search + target.hash,
  )
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  })
}

/**
 * Decrypt the request URL before routing, so routes match plaintext segments.
 * Must wrap the outermost app; middleware registered with app.use() runs after
 * Hono has already matched the route.
 */
export function withUrlDecryption(app: FetchApp, transformer: UrlTransformer): { fetch(request: Request): Promise<Response> } {
  return {
    async fetch(request: Request): Promise<Response> {
      const url = new URL(request.url)
      url.pathname = await transformer.decryptPath(url.pathname)

      if (transformer.queryPhase === "pre-routing" && url.search !== "") {
        const strategy = transformer.selectQueryStrategy("pre-routing")
        const { query } = await transformer.decryptQuery(parseQuery(url.searchParams), strategy)
        url.search = serializeQuery(query)
      }

      const response = await app.fetch(new Request(url, request))
      return encryptLocation(response, url, transformer)
    },
  }
}

// ---------------------------------------------------------------------------
// Post-routing: route middleware
// ---------------------------------------------------------------------------

/**
 * Decrypt query parameters for a route. With a shape, only its encrypted fields
 * are decrypted and unexpected failures are reported; without one every value is
 * tried. In the pre-routing phase the query was already rewritten and is exposed
 * as-is.
 */
export function queryDecryption(transformer: UrlTransformer, shape?: TSchema): MiddlewareHandler<UrlCryptoEnv> {
  return async (c, next) => {
    const query = parseQuery(new URL(c.req.url).searchParams)

    if (transformer.queryPhase === "pre-routing") {
      c.set("decryptedQuery", query)
      return next()
    }

    const strategy = transformer.selectQueryStrategy("post-routing", shape)
    const result = await transformer.decryptQuery(query, strategy)
    c.set("decryptedQuery", result.query)
    return next()
  }
}

/** First decrypted value of `key`, like c.req.query(key). */
export function decryptedQuery(c: Context<UrlCryptoEnv>, key: string): string | undefined {
  return decryptedQueries(c, key)?.[0]
}

/** All decrypted values of `key`, like c.req.queries(key). */
export function decryptedQueries(c: Context<UrlCryptoEnv>, key: string): string[] | undefined {
  const query: QueryMap | undefined = c.get("decryptedQuery")
  if (!query) return c.req.queries(key)
  return query.get(key)
}
