// src/url/shape.ts — Encrypted field declarations and the schema walker
//
// Target shapes are TypeBox object schemas. A leaf is marked encrypted with the
// `x-encrypted` keyword and may carry an `x-query-name` wire-name override:
//
//   const CustomerQuery = Type.Object({
//     lastName: Encrypted(Type.String()),
//     dob: FromQuery("dateOfBirth", Encrypted(Type.String(), { ignoreWarning: true })),
//     address: Type.Object({ postcode: Encrypted(Type.String()) }),
//   })

import { Kind } from "@sinclair/typebox"
import type { TObject, TSchema } from "@sinclair/typebox"

export const ENCRYPTED_KEYWORD = "x-encrypted"
export const QUERY_NAME_KEYWORD = "x-query-name"

export interface EncryptedOptions {
  /** Suppress the decryption warning for this field */
  ignoreWarning?: boolean
}

interface EncryptedMarker {
  ignoreWarning: boolean
}

/** A schema-declared field that is expected to carry an encrypted value. */
export interface FieldPolicy {
  /** Wire-level query key */
  readonly name: string
  readonly ignoreFailureWarning: boolean
}

// ---------------------------------------------------------------------------
// Declaration helpers
// ---------------------------------------------------------------------------

/** Mark a leaf schema as carrying an encrypted value. */
export function Encrypted<T extends TSchema>(schema: T, options: EncryptedOptions = {}): T {
  const marker: EncryptedMarker = { ignoreWarning: options.ignoreWarning ?? false }
  return { ...schema, [ENCRYPTED_KEYWORD]: marker }
}

/** Bind a leaf schema to a query key that differs from its property name. */
export function FromQuery<T extends TSchema>(name: string, schema: T): T {
  return { ...schema, [QUERY_NAME_KEYWORD]: name }
}

// ---------------------------------------------------------------------------
// Walker
// ---------------------------------------------------------------------------

function isObjectShape(schema: TSchema): schema is TObject {
  return schema[Kind] === "Object"
}

function readMarker(schema: TSchema): EncryptedMarker | undefined {
  const raw: unknown = schema[ENCRYPTED_KEYWORD]
  if (typeof raw !== "object" || raw === null) return undefined
  const ignoreWarning = "ignoreWarning" in raw && raw.ignoreWarning === true
  return { ignoreWarning }
}

function readWireName(schema: TSchema): string | undefined {
  const raw: unknown = schema[QUERY_NAME_KEYWORD]
  return typeof raw === "string" && raw !== "" ? raw : undefined
}

function memberPolicies(name: string, member: TSchema): FieldPolicy[] {
  if (isObjectShape(member)) return collectFieldPolicies(member)

  const marker = readMarker(member)
  if (!marker) return []
  return [{ name: readWireName(member) ?? name, ignoreFailureWarning: marker.ignoreWarning }]
}

/**
 * Depth-first walk over a target shape, in property declaration order.
 * Nested objects are spliced in place; duplicate wire names are kept.
 * Shapes must be acyclic (Type.Recursive self-references are `This` leaves).
 */
export function collectFieldPolicies(shape: TSchema): FieldPolicy[] {
  if (!isObjectShape(shape)) return []
  return Object.entries(shape.properties).flatMap(([name, member]) => memberPolicies(name, member))
}
