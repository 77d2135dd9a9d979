// src/url/query-strategy.ts — Query parameter decryption strategies
//
// Greedy: try every value, keep the original on failure, never report.
// Schema-driven: decrypt only the keys a target shape declares encrypted and
// aggregate unexpected failures into a single warning per request.

import type { TSchema } from "@sinclair/typebox"
import { isInvalidCiphertext } from "../errors.js"
import type { UrlCryptoErrorCode } from "../errors.js"
import type { Protector } from "../crypto/protector.js"
import { collectFieldPolicies } from "./shape.js"
import type { FieldPolicy } from "./shape.js"

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Query key to one or more values, in insertion order. */
export type QueryMap = Map<string, string[]>

export type QueryStrategy =
  | { kind: "greedy" }
  | { kind: "schema"; shape: TSchema | undefined }

export type DecryptionOutcome =
  | { kind: "decrypted"; value: string }
  | { kind: "passthrough"; value: string }
  | { kind: "failed-ignorable" }
  | { kind: "failed-reportable"; reason: string }

export interface QueryDecryptionResult {
  query: QueryMap
  /** Schema-declared keys that were expected to decrypt but did not */
  keysWithErrors: string[]
}

export interface QueryLogger {
  info(msg: string, meta?: Record<string, unknown>): void
  warn(msg: string, meta?: Record<string, unknown>): void
}

export interface SchemaQueryOptions {
  /** Suppress every reportable failure (default: false) */
  ignoreUnencryptedWarnings?: boolean
  /** Include each key's failure reason in the warning (default: false) */
  showErrorDetails?: boolean
  /** Logger (default: console) */
  logger?: QueryLogger
}

// ---------------------------------------------------------------------------
// Query map helpers
// ---------------------------------------------------------------------------

export function parseQuery(params: URLSearchParams): QueryMap {
  const query: QueryMap = new Map()
  for (const [key, value] of params) {
    const values = query.get(key)
    if (values) values.push(value)
    else query.set(key, [value])
  }
  return query
}

export function serializeQuery(query: QueryMap): string {
  const params = new URLSearchParams()
  for (const [key, values] of query) {
    for (const value of values) params.append(key, value)
  }
  return params.toString()
}

function cloneQuery(query: QueryMap): QueryMap {
  return new Map([...query].map(([key, values]) => [key, [...values]]))
}

// ---------------------------------------------------------------------------
// Greedy
// ---------------------------------------------------------------------------

async function decryptOrKeep(protector: Protector, value: string): Promise<string> {
  if (value === "") return value
  try {
    return await protector.unprotect(value)
  } catch (err) {
    if (isInvalidCiphertext(err)) return value
    throw err
  }
}

/** Attempt every value of every key; failures keep the original value. */
export async function greedyDecryptQuery(protector: Protector, query: QueryMap): Promise<QueryDecryptionResult> {
  const entries = await Promise.all(
    [...query].map(async ([key, values]): Promise<[string, string[]]> => [
      key,
      await Promise.all(values.map((value) => decryptOrKeep(protector, value))),
    ]),
  )
  return { query: new Map(entries), keysWithErrors: [] }
}

// ---------------------------------------------------------------------------
// Schema-driven
// ---------------------------------------------------------------------------

async function decryptField(
  protector: Protector,
  policy: FieldPolicy,
  value: string,
  ignoreAll: boolean,
): Promise<DecryptionOutcome> {
  if (value === "") return { kind: "passthrough", value }
  try {
    return { kind: "decrypted", value: await protector.unprotect(value) }
  } catch (err) {
    if (!isInvalidCiphertext(err)) throw err
    if (ignoreAll || policy.ignoreFailureWarning) return { kind: "failed-ignorable" }
    return { kind: "failed-reportable", reason: err.message }
  }
}

/**
 * Decrypt the keys `shape` declares encrypted. Only the first value of a
 * repeated key is decrypted, which is what a scalar binder reads. Keys without a
 * policy pass through. Without a shape the query passes through unchanged.
 */
export async function schemaDecryptQuery(
  protector: Protector,
  query: QueryMap,
  shape: TSchema | undefined,
  options: SchemaQueryOptions = {},
): Promise<QueryDecryptionResult> {
  const logger = options.logger ?? console
  const output = cloneQuery(query)

  if (!shape) {
    const code: UrlCryptoErrorCode = "MISSING_SCHEMA"
    logger.info(`[url-crypto] ${code}: no target shape, query passed through`, {
      code,
      keys: [...query.keys()],
    })
    return { query: output, keysWithErrors: [] }
  }

  const ignoreAll = options.ignoreUnencryptedWarnings ?? false
  const errors = new Map<string, string>()
  const handled = new Set<string>()

  // A wire name declared twice is decided by its first declaration
  for (const policy of collectFieldPolicies(shape)) {
    if (handled.has(policy.name)) continue
    handled.add(policy.name)

    const values = output.get(policy.name)
    if (!values || values.length === 0) continue

    const outcome = await decryptField(protector, policy, values[0], ignoreAll)
    if (outcome.kind === "decrypted") {
      values[0] = outcome.value
    } else if (outcome.kind === "failed-reportable") {
      errors.set(policy.name, outcome.reason)
    }
  }

  const keysWithErrors = [...errors.keys()]
  if (keysWithErrors.length > 0) {
    logger.warn("[url-crypto] query parameters failed to decrypt", {
      parameters: keysWithErrors,
      ...(options.showErrorDetails ? { errors: Object.fromEntries(errors) } : {}),
    })
  }

  return { query: output, keysWithErrors }
}
