#!/usr/bin/env node
// src/index.ts — obo-gateway entry point
// Boot sequence: config → validate → components → serve → sweep timer → signal handlers

import { serve } from "@hono/node-server"
import { loadConfig } from "./config.js"
import { ConfigError } from "./errors.js"
import { buildGateway } from "./boot/gateway-boot.js"
import { createLogger } from "./shared/logger.js"

async function main() {
  const bootStart = Date.now()
  const log = createLogger("gateway", process.env.GATEWAY_DEBUG === "true")
  log.info("booting obo-gateway...")

  // 1. Load and validate config (throws ConfigError)
  const config = loadConfig()
  log.info("config loaded", {
    port: config.port,
    authMode: config.auth.disabled ? "mock" : "jwt",
    resources: [...config.resources.keys()],
    admin: config.adminToken !== "",
  })
  if (config.auth.disabled) {
    log.warn("authentication DISABLED: every request runs as the mock identity", {
      subject: config.auth.mockIdentity.subject,
    })
  }

  // 2. Components
  const gateway = buildGateway(config)

  // 3. OBO cache sweep
  const sweepTimer = setInterval(() => {
    const removed = gateway.oboCache.sweep()
    if (removed > 0) log.debug("obo cache swept", { removed })
  }, config.obo.sweepIntervalMs)
  sweepTimer.unref()

  // 4. Serve
  const server = serve({ fetch: gateway.app.fetch, port: config.port, hostname: config.host }, (info) => {
    log.info(`obo-gateway ready on :${info.port} (boot: ${Date.now() - bootStart}ms)`)
  })

  // 5. Graceful shutdown: stop accepting, let in-flight requests finish, exit
  let shuttingDown = false
  const gracefulShutdown = (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    log.info(`${signal} received, shutting down gracefully...`)
    clearInterval(sweepTimer)

    setTimeout(() => {
      log.error("forced shutdown after 10s timeout")
      process.exit(1)
    }, 10_000).unref()

    server.close((err) => {
      if (err) {
        log.error("server close failed", { error: err.message })
        process.exit(1)
      }
      log.info("shutdown complete")
      process.exit(0)
    })
  }

  process.on("SIGTERM", () => gracefulShutdown("SIGTERM"))
  process.on("SIGINT", () => gracefulShutdown("SIGINT"))
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(`[gateway] ${err.message}`)
    for (const problem of err.problems) console.error(`[gateway]   - ${problem}`)
  } else {
    console.error("[gateway] fatal:", err)
  }
  process.exit(1)
})
