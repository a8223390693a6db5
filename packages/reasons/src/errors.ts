/**
 * Error taxonomy for the prediction lifecycle.
 * Each error carries a ReasonDetail so the transport layer can render it without
 * knowing which component raised it.
 */
import { ErrorBody, ReasonDetail, isClientReason } from '@metro-traffic/dto'
import { reason } from './factory'

export class ReasonedError extends Error {
  public readonly reason: ReasonDetail
  /** Human-readable detail; becomes `detail` in the response body. */
  public readonly detail: string

  constructor(reason: ReasonDetail, detail?: string, options?: { cause?: unknown }) {
    super(detail ?? reason.message, options)
    this.name = 'ReasonedError'
    this.reason = reason
    this.detail = detail ?? reason.message
  }

  get isClientError(): boolean {
    return isClientReason(this.reason)
  }
}

/** Malformed or out-of-bound client input. */
export class ValidationError extends ReasonedError {
  public readonly fields: readonly string[]

  constructor(detail: string, fields: readonly string[] = []) {
    super(reason('VALIDATION_ERROR', fields.length ? { fields: fields.join(',') } : undefined), detail)
    this.name = 'ValidationError'
    this.fields = fields
  }
}

/** The predictor was never loaded; a deployment problem, not a client one. */
export class ModelUnavailableError extends ReasonedError {
  constructor(detail?: string) {
    super(reason('MODEL_UNAVAILABLE'), detail)
    this.name = 'ModelUnavailableError'
  }
}

/** Vector assembly or inference failed. The cause is kept for logs, only its message is surfaced. */
export class PredictionFailedError extends ReasonedError {
  constructor(cause: unknown) {
    const causeMessage = cause instanceof Error ? cause.message : String(cause)
    super(reason('PREDICTION_FAILED'), `An error occurred during prediction: ${causeMessage}`, { cause })
    this.name = 'PredictionFailedError'
  }
}

export function isReasonedError(e: unknown): e is ReasonedError {
  return e instanceof ReasonedError
}

/** Anything that is not a ReasonedError becomes INTERNAL_ERROR with a generic detail. */
export function toErrorBody(e: unknown): { status: number; body: ErrorBody } {
  if (isReasonedError(e)) {
    return { status: e.reason.http_status, body: { error: e.reason.code, detail: e.detail } }
  }
  const internal = reason('INTERNAL_ERROR')
  return { status: internal.http_status, body: { error: internal.code, detail: internal.message } }
}
