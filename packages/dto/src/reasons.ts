import { ReasonCode, ReasonCategory, ReasonDetail } from './enums'

// Centralized mapping from ReasonCode -> ReasonDetail (stable code, category, http_status, message)
export const REASONS: Record<ReasonCode, ReasonDetail> = {
  // CLIENT
  VALIDATION_ERROR: { code: 'VALIDATION_ERROR', category: ReasonCategory.CLIENT, http_status: 400, message: 'Invalid input data' },
  CLIENT_PAYLOAD_TOO_LARGE: { code: 'CLIENT_PAYLOAD_TOO_LARGE', category: ReasonCategory.CLIENT, http_status: 413, message: 'Request body exceeds allowed size' },
  CLIENT_UNSUPPORTED_MEDIA_TYPE: { code: 'CLIENT_UNSUPPORTED_MEDIA_TYPE', category: ReasonCategory.CLIENT, http_status: 415, message: 'Request body must be sent as application/json' },
  CLIENT_NOT_FOUND: { code: 'CLIENT_NOT_FOUND', category: ReasonCategory.CLIENT, http_status: 404, message: 'Not found' },

  // MODEL
  MODEL_UNAVAILABLE: { code: 'MODEL_UNAVAILABLE', category: ReasonCategory.MODEL, http_status: 500, message: 'Model not loaded. Please check API server logs.' },
  PREDICTION_FAILED: { code: 'PREDICTION_FAILED', category: ReasonCategory.MODEL, http_status: 500, message: 'An error occurred during prediction' },

  // INTERNAL
  INTERNAL_ERROR: { code: 'INTERNAL_ERROR', category: ReasonCategory.INTERNAL, http_status: 500, message: 'Internal server error' },
}

export function getReason(code: ReasonCode): ReasonDetail {
  return REASONS[code]
}

export function isClientReason(reason: ReasonDetail): boolean {
  return reason.category === ReasonCategory.CLIENT
}
