import { ModelStatus } from './enums'

/**
 * Canonical feature column order. The trained artifacts list their
 * `feature_columns` in exactly this order.
 */
export const FEATURE_COLUMNS = [
  'holiday',
  'temp',
  'rain_1h',
  'snow_1h',
  'clouds_all',
  'weather_main',
  'hour',
  'day_of_week',
  'month',
  'is_rush_hour',
] as const

export type FeatureName = (typeof FEATURE_COLUMNS)[number]

export const CATEGORICAL_FEATURES = ['holiday', 'weather_main'] as const

export type CategoricalFeature = (typeof CATEGORICAL_FEATURES)[number]

export type RushHourFlag = 0 | 1

export interface FeatureRecord {
  readonly holiday: string
  /** Kelvin. */
  readonly temp: number
  /** Millimetres of rain in the last hour. */
  readonly rain_1h: number
  /** Millimetres of snow in the last hour. */
  readonly snow_1h: number
  readonly clouds_all: number
  readonly weather_main: string
  readonly hour: number
  /** 0 = Monday, 6 = Sunday. */
  readonly day_of_week: number
  readonly month: number
  readonly is_rush_hour: RushHourFlag
}

/** Request body accepted by POST /predict; every field is optional. */
export type FeatureInput = {
  [K in FeatureName]?: K extends 'is_rush_hour' ? RushHourFlag | boolean : FeatureRecord[K]
}

export const FEATURE_DEFAULTS: FeatureRecord = {
  holiday: 'None',
  temp: 288.28,
  rain_1h: 0.0,
  snow_1h: 0.0,
  clouds_all: 40,
  weather_main: 'Clouds',
  hour: 9,
  day_of_week: 1,
  month: 10,
  is_rush_hour: 1,
}

export interface PredictionResult {
  readonly predicted_traffic_volume: number
  readonly model_version: string
}

export interface HealthResponse {
  status: 'healthy' | 'unhealthy'
  model_loaded: boolean
  timestamp: string
}

export interface ServiceInfo {
  message: string
  status: 'running'
  model_loaded: boolean
  model_status: ModelStatus
  version: string
  endpoints: Record<string, string>
}

/**
 * Categories a predictor accepts for a column whose encoder rejects unseen values.
 * Columns absent from the map have an open vocabulary.
 */
export type ClosedVocabulary = Readonly<Partial<Record<CategoricalFeature, readonly string[]>>>
