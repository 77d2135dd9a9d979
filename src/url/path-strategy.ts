// src/url/path-strategy.ts — Greedy path segment decryption and its inverse
//
// Paths carry no schema at interception time, so every segment is a candidate.
// A segment that fails to decrypt is assumed to never have been encrypted and
// passes through unchanged; path failures are never reported.

import { isInvalidCiphertext } from "../errors.js"
import type { Protector } from "../crypto/protector.js"

/** Decides whether a path segment is encrypted on the way out. */
export type SegmentSelector = (segment: string, index: number) => boolean

/** Non-empty `/`-separated segments of a path, in order. */
export function splitSegments(path: string): string[] {
  return path.split("/").filter((segment) => segment !== "")
}

/** Rebuild a path from segments, dropping empty ones. */
export function joinSegments(segments: readonly string[]): string {
  return "/" + segments.filter((segment) => segment !== "").join("/")
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment)
  } catch {
    return segment
  }
}

async function decryptSegment(protector: Protector, segment: string): Promise<string> {
  try {
    const plaintext = await protector.unprotect(decodeSegment(segment))
    // Blank plaintext leaves no segment behind
    if (plaintext.trim() === "") return ""
    // Plaintext may contain "/" or "?"; keep it a single segment
    return encodeURIComponent(plaintext)
  } catch (err) {
    if (isInvalidCiphertext(err)) return segment
    throw err
  }
}

/** Decrypt each path segment independently; segments that are or decrypt to blanks are dropped. */
export async function decryptPath(protector: Protector, path: string): Promise<string> {
  const segments = await Promise.all(
    splitSegments(path).map((segment) => decryptSegment(protector, segment)),
  )
  return joinSegments(segments)
}

/** Encrypt the segments `select` accepts (all of them by default). */
export async function encryptPath(
  protector: Protector,
  path: string,
  select: SegmentSelector = () => true,
): Promise<string> {
  const segments = await Promise.all(
    splitSegments(path).map(async (segment, index) =>
      select(segment, index) ? protector.protect(decodeSegment(segment)) : segment,
    ),
  )
  return joinSegments(segments)
}
