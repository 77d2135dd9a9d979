// src/crypto/protector.ts — Purpose-scoped token protection for URL values
//
// Tokens are compact JWEs (alg "dir", enc "A256GCM"). Each purpose gets its own
// content key, derived from the master secret with HKDF-SHA256 using the purpose
// as `info`, so a token minted for one purpose never decrypts under another.

import { hkdfSync } from "node:crypto"
import { CompactEncrypt, compactDecrypt, errors } from "jose"
import { UrlCryptoError } from "../errors.js"

// --- Types ---

export interface Protector {
  readonly purpose: string
  /** Encrypt a plaintext string into a URL-safe token. */
  protect(plaintext: string): Promise<string>
  /** Decrypt a token. Rejects with INVALID_CIPHERTEXT for anything that is not a token of this purpose. */
  unprotect(token: string): Promise<string>
}

export interface DataProtectionProviderConfig {
  /** Master secret; at least MIN_SECRET_LENGTH characters */
  secret: string
}

export const MIN_SECRET_LENGTH = 32

const HKDF_SALT = "url-crypto/v1"
const KEY_BYTES = 32
const KEY_MANAGEMENT_ALGORITHMS = ["dir"]
const CONTENT_ENCRYPTION_ALGORITHMS = ["A256GCM"]

// --- JWE Protector ---

export class JweProtector implements Protector {
  readonly purpose: string
  private readonly key: Uint8Array
  private readonly encoder = new TextEncoder()
  private readonly decoder = new TextDecoder("utf-8", { fatal: true })

  constructor(purpose: string, key: Uint8Array) {
    if (key.byteLength !== KEY_BYTES) {
      throw new UrlCryptoError("CONFIG_INVALID", `Protector key must be ${KEY_BYTES} bytes`, {
        purpose,
        bytes: key.byteLength,
      })
    }
    this.purpose = purpose
    this.key = key
  }

  async protect(plaintext: string): Promise<string> {
    return new CompactEncrypt(this.encoder.encode(plaintext))
      .setProtectedHeader({ alg: "dir", enc: "A256GCM" })
      .encrypt(this.key)
  }

  async unprotect(token: string): Promise<string> {
    if (token === "") {
      throw new UrlCryptoError("INVALID_CIPHERTEXT", "Empty token", { purpose: this.purpose })
    }

    let plaintext: Uint8Array
    try {
      const result = await compactDecrypt(token, this.key, {
        keyManagementAlgorithms: KEY_MANAGEMENT_ALGORITHMS,
        contentEncryptionAlgorithms: CONTENT_ENCRYPTION_ALGORITHMS,
      })
      plaintext = result.plaintext
    } catch (err) {
      if (err instanceof errors.JOSEError) {
        throw new UrlCryptoError("INVALID_CIPHERTEXT", err.message, {
          purpose: this.purpose,
          reason: err.code,
        })
      }
      throw err
    }

    try {
      return this.decoder.decode(plaintext)
    } catch {
      throw new UrlCryptoError("INVALID_CIPHERTEXT", "Plaintext is not valid UTF-8", { purpose: this.purpose })
    }
  }
}

// --- Provider ---

/**
 * Hands out one Protector per purpose. Protectors hold no mutable state and are
 * shared by every in-flight request.
 */
export class DataProtectionProvider {
  private readonly secret: Uint8Array
  private readonly protectors = new Map<string, Protector>()

  constructor(config: DataProtectionProviderConfig) {
    if (config.secret.length < MIN_SECRET_LENGTH) {
      throw new UrlCryptoError(
        "CONFIG_INVALID",
        `Master secret must be at least ${MIN_SECRET_LENGTH} characters`,
        { length: config.secret.length },
      )
    }
    this.secret = new TextEncoder().encode(config.secret)
  }

  createProtector(purpose: string): Protector {
    if (!purpose) {
      throw new UrlCryptoError("CONFIG_INVALID", "Protector purpose must be non-empty")
    }
    const cached = this.protectors.get(purpose)
    if (cached) return cached

    const protector = new JweProtector(purpose, this.deriveKey(purpose))
    this.protectors.set(purpose, protector)
    return protector
  }

  private deriveKey(purpose: string): Uint8Array {
    return new Uint8Array(hkdfSync("sha256", this.secret, HKDF_SALT, purpose, KEY_BYTES))
  }
}
