#!/usr/bin/env node
// src/cli.ts — url-token CLI: encrypt or decrypt a single URL value
// Usage: url-token <encrypt|decrypt> <path|query> <value>

import { realpathSync } from "node:fs"
import { fileURLToPath } from "node:url"
import { loadConfig } from "./config.js"
import type { Env } from "./config.js"
import { DataProtectionProvider } from "./crypto/protector.js"
import { UrlCryptoError } from "./errors.js"

export interface CliIO {
  stdout(line: string): void
  stderr(line: string): void
}

const USAGE = [
  "Usage: url-token <encrypt|decrypt> <path|query> <value>",
  "",
  "Arguments:",
  "  encrypt|decrypt  Direction",
  "  path|query       Which purpose to use (URL_CRYPTO_PATH_PURPOSE / URL_CRYPTO_QUERY_PURPOSE)",
  "  value            Plaintext to encrypt, or token to decrypt",
  "",
  "Requires URL_CRYPTO_SECRET.",
]

const defaultIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
}

/** Run the CLI and return its exit code. `args` excludes the node and script paths. */
export async function runCli(args: string[], env: Env = process.env, io: CliIO = defaultIO): Promise<number> {
  const [direction, target, value] = args
  if (
    args.length !== 3 ||
    (direction !== "encrypt" && direction !== "decrypt") ||
    (target !== "path" && target !== "query")
  ) {
    for (const line of USAGE) io.stderr(line)
    return 2
  }

  try {
    const config = loadConfig(env)
    const provider = new DataProtectionProvider({ secret: config.crypto.secret })
    const purpose = target === "path" ? config.crypto.pathPurpose : config.crypto.queryPurpose
    const protector = provider.createProtector(purpose)

    const output = direction === "encrypt" ? await protector.protect(value) : await protector.unprotect(value)
    io.stdout(output)
    return 0
  } catch (err) {
    if (err instanceof UrlCryptoError) {
      io.stderr(JSON.stringify(err.toJSON()))
      return 1
    }
    throw err
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1]
  if (!script) return false
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url)
  } catch {
    return false
  }
}

if (isEntryPoint()) {
  runCli(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((err) => {
      console.error(JSON.stringify({ error: "UrlCryptoError", message: `Unhandled error: ${err}` }))
      process.exit(1)
    })
}
