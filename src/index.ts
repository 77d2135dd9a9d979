// src/index.ts — url-crypto gateway entry point
// Boot sequence: config → transformer → app → serve

import { serve } from "@hono/node-server"
import { loadConfig } from "./config.js"
import { createApp } from "./gateway/server.js"
import { createUrlTransformer, withUrlDecryption } from "./gateway/url-crypto.js"

async function main() {
  console.log("[gateway] booting url-crypto...")

  const config = loadConfig()
  console.log(
    `[gateway] config loaded: port=${config.port}, query_phase=${config.query.phase}, outbound=${config.outbound.segmentPattern !== null}`,
  )

  const transformer = createUrlTransformer(config)
  const app = createApp(config, { transformer })
  const handler = withUrlDecryption(app, transformer)

  const server = serve({ fetch: handler.fetch, port: config.port, hostname: config.host }, (info) => {
    console.log(`[gateway] listening on ${config.host}:${info.port}`)
  })

  const shutdown = (signal: string) => {
    console.log(`[gateway] ${signal} received, shutting down`)
    setTimeout(() => {
      console.error("[gateway] forced shutdown after 10s timeout")
      process.exit(1)
    }, 10_000).unref()

    server.close((err) => {
      if (err) {
        console.error("[gateway] close failed:", err)
        process.exit(1)
      }
      console.log("[gateway] shutdown complete")
      process.exit(0)
    })
  }

  process.on("SIGTERM", () => shutdown("SIGTERM"))
  process.on("SIGINT", () => shutdown("SIGINT"))
}

main().catch((err) => {
  console.error("[gateway] fatal:", err)
  process.exit(1)
})
