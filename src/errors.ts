// src/errors.ts — Typed error class for URL cryptography

/** Error codes for URL cryptography operations */
export type UrlCryptoErrorCode =
  | "INVALID_CIPHERTEXT"
  | "MISSING_SCHEMA"
  | "CONFIG_INVALID"

export class UrlCryptoError extends Error {
  readonly name = "UrlCryptoError"
  readonly code: UrlCryptoErrorCode
  readonly context: Record<string, unknown>

  constructor(code: UrlCryptoErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(`[url-crypto] ${code}: ${message}`)
    this.code = code
    this.context = context
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    }
  }
}

/** True when a value failed to decrypt (malformed, tampered, or foreign token). */
export function isInvalidCiphertext(err: unknown): err is UrlCryptoError {
  return err instanceof UrlCryptoError && err.code === "INVALID_CIPHERTEXT"
}
