/**
 * Terminal error middleware. Every failure leaves as `{ error, detail }` with
 * the status from the reason registry; nothing is dropped silently.
 */
import { ErrorRequestHandler, Request, Response } from 'express'
import { ReasonedError, ValidationError, isReasonedError, reason, toErrorBody } from '@metro-traffic/reasons'
import MetricsTracker from '../services/MetricsTracker'
import { getLogger } from '../utils/logger'

// body-parser tags its errors with a `type` string
function bodyParserType(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'type' in err && typeof err.type === 'string') return err.type
  return undefined
}

/** Maps transport-level failures onto the taxonomy; already-reasoned errors pass through. */
export function classifyError(err: unknown): unknown {
  if (isReasonedError(err)) return err
  switch (bodyParserType(err)) {
    case 'entity.parse.failed':
      return new ValidationError('Request body is not valid JSON')
    case 'entity.too.large':
      return new ReasonedError(reason('CLIENT_PAYLOAD_TOO_LARGE'))
    default:
      return err
  }
}

export function notFound(req: Request, res: Response) {
  const r = reason('CLIENT_NOT_FOUND')
  res.status(r.http_status).json({ error: r.code, detail: `No route for ${req.method} ${req.path}` })
}

export function errorHandler(metrics: MetricsTracker): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    const classified = classifyError(err)
    const { status, body } = toErrorBody(classified)
    const log = req.log ?? getLogger()

    const line = { event: 'http.error', method: req.method, path: req.path, code: body.error, detail: body.detail }
    if (isReasonedError(classified) && classified.isClientError) log.warn(line)
    else log.error({ ...line, err: classified })
    metrics.recordError(body.error)
    res.status(status).json(body)
  }
}
