/*
 * Application entry point for the traffic volume inference server
 *
 * Responsibilities:
 *  1. Load the predictor artifact once (a missing artifact leaves the service unhealthy, not down)
 *  2. Start the HTTP API server (Express app) with the shared model state
 *  3. Provide graceful shutdown on SIGINT / SIGTERM
 */

import http from 'http'
import { createApp } from './http'
import { ENV } from './config'
import MetricsTracker from './services/MetricsTracker'
import { initializeModel } from './services/ModelState'
import { getLogger } from './utils/logger'

let server: http.Server | null = null
let shuttingDown = false

async function start(): Promise<void> {
  const logger = getLogger()
  logger.info({ event: 'service.starting', model_path: ENV.MODEL_PATH, node_env: ENV.NODE_ENV })

  const model = initializeModel(ENV.MODEL_PATH)
  const app = createApp({ model, metrics: MetricsTracker.getInstance() })

  await new Promise<void>((resolve) => {
    server = app.listen(ENV.PORT, () => {
      logger.info({ event: 'service.listening', port: ENV.PORT, model_status: model.status })
      resolve()
    })
  })
}

function shutdown(signal: NodeJS.Signals): void {
  if (shuttingDown) return
  shuttingDown = true
  const logger = getLogger()
  logger.info({ event: 'service.stopping', signal })
  if (!server) {
    process.exit(0)
  }
  server.close((err) => {
    if (err) {
      logger.error({ event: 'service.stop_failed', err })
      process.exitCode = 1
    }
    process.exit()
  })
  // Force-exit if connections linger
  setTimeout(() => process.exit(1), 10_000).unref()
}

process.on('SIGINT', shutdown)
process.on('SIGTERM', shutdown)

start().catch((err: unknown) => {
  getLogger().fatal({ event: 'service.start_failed', err })
  process.exitCode = 1
})
