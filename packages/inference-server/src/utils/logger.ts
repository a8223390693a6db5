import pino from 'pino'
import { ENV } from '../config'

type HttpPayload = {
  path: string
  method: string
  status: number
  corr_id?: string
  latency_ms?: number
}

type ModelPayload = {
  artifact_path?: string
  model_type?: string
  artifact_version?: string
  error?: string
}

// create default logger; tests can replace via setLogger
let logger: pino.Logger = pino({ level: ENV.LOG_LEVEL })

export function setLogger(l: pino.Logger) {
  logger = l
}

export function getLogger(): pino.Logger {
  return logger
}

export function logHttp(payload: HttpPayload): void {
  const base = {
    event: 'http.request',
    path: payload.path,
    method: payload.method,
    status: payload.status,
    corr_id: payload.corr_id,
    latency_ms: payload.latency_ms
  }
  // 5xx already produced a prediction.failed / model.unavailable line
  if (payload.status >= 500) logger.warn(base)
  else logger.info(base)
}

export function logModelLoaded(payload: ModelPayload): void {
  logger.info({ event: 'model.loaded', ...payload })
}

export function logModelUnavailable(payload: ModelPayload): void {
  logger.error({ event: 'model.unavailable', ...payload })
}
