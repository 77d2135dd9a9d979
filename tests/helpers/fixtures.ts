// tests/helpers/fixtures.ts — Shared protectors, config and logger fakes

import { vi } from "vitest"
import type { Static, TSchema } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { loadConfig } from "../../src/config.js"
import type { Env, UrlCryptoConfig } from "../../src/config.js"
import { DataProtectionProvider } from "../../src/crypto/protector.js"
import type { QueryLogger } from "../../src/url/query-strategy.js"

export const TEST_SECRET = "test-secret-for-url-crypto-unit-tests"
export const PATH_PURPOSE = "url-crypto.path"
export const QUERY_PURPOSE = "url-crypto.query"

export function testProvider(secret: string = TEST_SECRET): DataProtectionProvider {
  return new DataProtectionProvider({ secret })
}

export function testConfig(env: Env = {}): UrlCryptoConfig {
  return loadConfig({ URL_CRYPTO_SECRET: TEST_SECRET, ...env })
}

/** Read a JSON response body, asserting it matches `schema`. */
export async function readJson<T extends TSchema>(res: Response, schema: T): Promise<Static<T>> {
  const body: unknown = await res.json()
  if (!Value.Check(schema, body)) {
    throw new Error(`Unexpected response body: ${JSON.stringify(body)}`)
  }
  return body
}

export function fakeLogger() {
  return {
    info: vi.fn<QueryLogger["info"]>(),
    warn: vi.fn<QueryLogger["warn"]>(),
  }
}
