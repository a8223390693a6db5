/**
 * POST /predict handler
 *
 * Only JSON bodies are read: express.json leaves any other body unparsed, and
 * an unread body must not fall through to the all-defaults record. Validation
 * runs next so a bad request never reaches the model. Errors are handed to the
 * error middleware, which owns the response shape.
 */
import { Request, Response, NextFunction, RequestHandler } from 'express'
import { ModelUnavailableError, ReasonedError, reason, toErrorBody } from '@metro-traffic/reasons'
import MetricsTracker from '../services/MetricsTracker'
import { PredictionOrchestrator } from '../services/PredictionOrchestrator'
import { validateFeatureRecord } from '../validators/featureRecordValidator'
import { getLogger } from '../utils/logger'

export function unsupportedMediaType(contentType: string | undefined): ReasonedError {
  return new ReasonedError(
    reason('CLIENT_UNSUPPORTED_MEDIA_TYPE'),
    `Content-Type must be application/json, received ${contentType ?? 'none'}`
  )
}

export function postPredict(orchestrator: PredictionOrchestrator, metrics: MetricsTracker): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now()
    const log = req.log ?? getLogger()

    const reject = (err: ReasonedError) => {
      metrics.incPrediction('rejected')
      log.warn({ event: 'prediction.rejected', code: err.reason.code, detail: err.detail })
      next(err)
    }

    if (!req.is('application/json')) {
      reject(unsupportedMediaType(req.get('content-type')))
      return
    }

    const validation = validateFeatureRecord(req.body, { vocabulary: orchestrator.vocabulary })
    if (!validation.valid) {
      reject(validation.error)
      return
    }

    log.info({ event: 'prediction.request', features: validation.value })
    try {
      const result = orchestrator.predict(validation.value)
      metrics.incPrediction('success')
      metrics.observeLatency(Date.now() - start)
      log.info({ event: 'prediction.success', predicted_traffic_volume: result.predicted_traffic_volume, model_version: result.model_version })
      res.status(200).json(result)
    } catch (e) {
      metrics.incPrediction(e instanceof ModelUnavailableError ? 'unavailable' : 'failed')
      const { body } = toErrorBody(e)
      log.error({ event: 'prediction.failed', code: body.error, detail: body.detail, err: e })
      next(e)
    }
  }
}

export default postPredict
