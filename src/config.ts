// src/config.ts — Configuration loader from environment variables

import { MIN_SECRET_LENGTH } from "./crypto/protector.js"
import { UrlCryptoError } from "./errors.js"
import type { PipelinePhase } from "./url/transformer.js"

export interface UrlCryptoConfig {
  // Gateway
  port: number
  host: string

  crypto: {
    secret: string
    /** Purpose for path tokens; must differ from queryPurpose */
    pathPurpose: string
    queryPurpose: string
  }

  query: {
    phase: PipelinePhase
    ignoreUnencryptedWarnings: boolean
    /** Include per-key failure reasons in the aggregated warning */
    showErrorDetails: boolean
  }

  outbound: {
    /** Location path segments matching this pattern are re-encrypted; null disables */
    segmentPattern: RegExp | null
  }
}

export type Env = Record<string, string | undefined>

const VALID_PHASES = ["pre-routing", "post-routing"] as const

function parsePhase(value: string | undefined): PipelinePhase {
  const v = (value ?? "post-routing").trim().toLowerCase()
  for (const phase of VALID_PHASES) {
    if (phase === v) return phase
  }
  throw new UrlCryptoError(
    "CONFIG_INVALID",
    `URL_CRYPTO_QUERY_PHASE must be one of ${VALID_PHASES.join(", ")} (got "${value}")`,
  )
}

/** Parse an integer from an environment variable, failing fast on NaN. */
function parseIntEnv(env: Env, envKey: string, fallback: string): number {
  const raw = env[envKey] ?? fallback
  const value = parseInt(raw, 10)
  if (isNaN(value)) {
    throw new UrlCryptoError("CONFIG_INVALID", `${envKey} must be a valid integer (got "${raw}")`)
  }
  return value
}

function parsePattern(value: string | undefined): RegExp | null {
  if (!value) return null
  try {
    return new RegExp(value)
  } catch (err) {
    throw new UrlCryptoError("CONFIG_INVALID", `URL_CRYPTO_OUTBOUND_SEGMENTS is not a valid regex: ${value}`, {
      cause: String(err),
    })
  }
}

export function loadConfig(env: Env = process.env): UrlCryptoConfig {
  const secret = env.URL_CRYPTO_SECRET
  if (!secret) {
    throw new UrlCryptoError("CONFIG_INVALID", "URL_CRYPTO_SECRET is required")
  }
  if (secret.length < MIN_SECRET_LENGTH) {
    throw new UrlCryptoError(
      "CONFIG_INVALID",
      `URL_CRYPTO_SECRET must be at least ${MIN_SECRET_LENGTH} characters`,
    )
  }

  const pathPurpose = env.URL_CRYPTO_PATH_PURPOSE || "url-crypto.path"
  const queryPurpose = env.URL_CRYPTO_QUERY_PURPOSE || "url-crypto.query"
  // Shared purposes would let path tokens decrypt as query tokens and vice versa
  if (pathPurpose === queryPurpose) {
    throw new UrlCryptoError("CONFIG_INVALID", "Path and query purposes must differ", { purpose: pathPurpose })
  }

  return {
    port: parseIntEnv(env, "PORT", "3000"),
    host: env.HOST ?? "0.0.0.0",

    crypto: {
      secret,
      pathPurpose,
      queryPurpose,
    },

    query: {
      phase: parsePhase(env.URL_CRYPTO_QUERY_PHASE),
      ignoreUnencryptedWarnings: env.URL_CRYPTO_IGNORE_UNENCRYPTED_WARNINGS === "true",
      showErrorDetails: env.URL_CRYPTO_SHOW_ERROR_DETAILS === "true",
    },

    outbound: {
      segmentPattern: parsePattern(env.URL_CRYPTO_OUTBOUND_SEGMENTS),
    },
  }
}
