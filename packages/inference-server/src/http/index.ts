/**
 * HTTP router for the inference server
 * Exposes `createApp()` to allow tests to mount the app without starting a server.
 * The model state is built once by the caller and shared by every request.
 */
import express, { Express } from 'express'
import { ENV } from '../config'
import MetricsTracker from '../services/MetricsTracker'
import { ModelState, isModelLoaded } from '../services/ModelState'
import { PredictionOrchestrator } from '../services/PredictionOrchestrator'
import { logHttp } from '../utils/logger'
import corr from './middleware/corr'
import cors from './middleware/cors'
import { errorHandler, notFound } from './errors'
import postPredict from './predict'
import { getHealth, getInfo, getMetrics } from './status'

export interface AppDeps {
  model: ModelState
  metrics?: MetricsTracker
  modelVersion?: string
  serviceName?: string
  corsAllowOrigin?: string
  jsonBodyLimit?: string
}

export function createApp(deps: AppDeps): Express {
  const metrics = deps.metrics ?? MetricsTracker.getInstance()
  const orchestrator = new PredictionOrchestrator(deps.model, { modelVersion: deps.modelVersion ?? ENV.MODEL_VERSION })
  metrics.setModelLoaded(isModelLoaded(deps.model))

  const app = express()
  app.disable('x-powered-by')
  app.use(corr)
  app.use(cors(deps.corsAllowOrigin ?? ENV.CORS_ALLOW_ORIGIN))

  // One structured line per request, after the response is sent
  app.use((req, res, next) => {
    const start = Date.now()
    res.on('finish', () => {
      logHttp({ path: req.path, method: req.method, status: res.statusCode, corr_id: req.corr_id, latency_ms: Date.now() - start })
    })
    next()
  })

  app.use(express.json({ limit: deps.jsonBodyLimit ?? ENV.JSON_BODY_LIMIT }))

  app.get('/', getInfo(deps.model, deps.serviceName))
  app.get('/health', getHealth(deps.model))
  app.get('/metrics', getMetrics(metrics))
  app.post('/predict', postPredict(orchestrator, metrics))

  app.use(notFound)
  app.use(errorHandler(metrics))

  return app
}

export default createApp
