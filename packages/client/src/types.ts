import type { ErrorBody, FeatureInput, HealthResponse, PredictionResult, ServiceInfo } from '@metro-traffic/dto'

export type { ErrorBody, FeatureInput, HealthResponse, PredictionResult, ServiceInfo }

export type ClientConfig = {
  baseUrl: string
  timeoutMs?: number // per request, default 5000
}

export type RequestOptions = {
  corrId?: string // sent as x-corr-id
}

/** Form values as the front-ends collect them, before conversion to model units. */
export type TrafficForm = {
  holiday: string
  temperatureF: number
  weatherMain: string
  cloudsAll: number
  hour: number
  dayOfWeek: number
  month: number
  rain1h?: number
  snow1h?: number
}

export function isErrorBody(data: unknown): data is ErrorBody {
  return (
    typeof data === 'object' &&
    data !== null &&
    'error' in data &&
    typeof data.error === 'string' &&
    'detail' in data &&
    typeof data.detail === 'string'
  )
}
