/**
 * Read-only status handlers: GET / (service info), GET /health (readiness)
 * and GET /metrics. None of them touch the predictor.
 */
import { Request, Response, NextFunction, RequestHandler } from 'express'
import { ServiceInfo } from '@metro-traffic/dto'
import { CONSTANTS } from '../config'
import MetricsTracker from '../services/MetricsTracker'
import { ModelState, isModelLoaded, readiness } from '../services/ModelState'

export const ENDPOINTS: Record<string, string> = {
  predict: 'POST /predict - Make traffic volume prediction',
  health: 'GET /health - Readiness check',
  info: 'GET / - Service information',
  metrics: 'GET /metrics - Prometheus metrics'
}

export function serviceInfo(model: ModelState, serviceName: string = CONSTANTS.SERVICE_NAME): ServiceInfo {
  return {
    message: serviceName,
    status: 'running',
    model_loaded: isModelLoaded(model),
    model_status: model.status,
    version: CONSTANTS.API_VERSION,
    endpoints: ENDPOINTS
  }
}

export function getInfo(model: ModelState, serviceName?: string): RequestHandler {
  return (_req: Request, res: Response) => {
    res.status(200).json(serviceInfo(model, serviceName))
  }
}

export function getHealth(model: ModelState): RequestHandler {
  return (_req: Request, res: Response) => {
    const body = readiness(model)
    res.status(body.model_loaded ? 200 : 503).json(body)
  }
}

export function getMetrics(metrics: MetricsTracker): RequestHandler {
  return (_req: Request, res: Response, next: NextFunction) => {
    metrics
      .snapshot()
      .then((text) => {
        res.setHeader('Content-Type', metrics.registry.contentType)
        res.status(200).send(text)
      })
      .catch(next)
  }
}
