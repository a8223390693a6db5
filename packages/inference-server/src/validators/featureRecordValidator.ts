/* This file's purpose is to validate the body of a prediction request.
    Absent fields take their documented defaults; present fields must match type and bounds. */

import { z } from 'zod'
import {
  CATEGORICAL_FEATURES,
  ClosedVocabulary,
  FEATURE_DEFAULTS,
  FeatureName,
  FeatureRecord,
  RushHourFlag,
} from '@metro-traffic/dto'
import { ValidationError } from '@metro-traffic/reasons'

type Bounds = { min?: number; max?: number; int?: boolean }

function bounded(field: FeatureName, { min, max, int }: Bounds) {
  let schema = z.number({ invalid_type_error: `${field} must be a number` }).finite({ message: `${field} must be finite` })
  if (int) schema = schema.int({ message: `${field} must be an integer` })
  if (min !== undefined) schema = schema.min(min, { message: `${field} must be >= ${min}` })
  if (max !== undefined) schema = schema.max(max, { message: `${field} must be <= ${max}` })
  return schema
}

function category(field: FeatureName) {
  return z.string({ invalid_type_error: `${field} must be a string` })
}

const BODY_MESSAGE = 'Request body must be a JSON object'

export const FeatureRecordSchema = z.object(
  {
    holiday: category('holiday').default(FEATURE_DEFAULTS.holiday),
    temp: bounded('temp', { min: 200, max: 350 }).default(FEATURE_DEFAULTS.temp),
    rain_1h: bounded('rain_1h', { min: 0 }).default(FEATURE_DEFAULTS.rain_1h),
    snow_1h: bounded('snow_1h', { min: 0 }).default(FEATURE_DEFAULTS.snow_1h),
    clouds_all: bounded('clouds_all', { min: 0, max: 100, int: true }).default(FEATURE_DEFAULTS.clouds_all),
    weather_main: category('weather_main').default(FEATURE_DEFAULTS.weather_main),
    hour: bounded('hour', { min: 0, max: 23, int: true }).default(FEATURE_DEFAULTS.hour),
    day_of_week: bounded('day_of_week', { min: 0, max: 6, int: true }).default(FEATURE_DEFAULTS.day_of_week),
    month: bounded('month', { min: 1, max: 12, int: true }).default(FEATURE_DEFAULTS.month),
    // booleans are accepted and stored as 0/1
    is_rush_hour: z
      .preprocess((v) => (typeof v === 'boolean' ? Number(v) : v), bounded('is_rush_hour', { min: 0, max: 1, int: true }))
      .default(FEATURE_DEFAULTS.is_rush_hour),
  },
  { invalid_type_error: BODY_MESSAGE, required_error: BODY_MESSAGE }
)

export type ValidationResult = { valid: true; value: FeatureRecord } | { valid: false; error: ValidationError }

export interface ValidateOptions {
  /** Closed vocabularies declared by the loaded predictor. */
  vocabulary?: ClosedVocabulary
}

function fail(messages: string[], fields: string[]): ValidationResult {
  const unique = [...new Set(messages)]
  return { valid: false, error: new ValidationError(unique.join('; '), [...new Set(fields)]) }
}

export function validateFeatureRecord(body: unknown, options: ValidateOptions = {}): ValidationResult {
  const res = FeatureRecordSchema.safeParse(body)
  if (!res.success) {
    const issues = res.error.issues
    return fail(
      issues.map((i) => i.message),
      issues.flatMap((i) => (typeof i.path[0] === 'string' ? [i.path[0]] : []))
    )
  }

  const data = res.data
  const isRushHour: RushHourFlag = data.is_rush_hour === 1 ? 1 : 0
  const value: FeatureRecord = Object.freeze({ ...data, is_rush_hour: isRushHour })

  const vocabulary = options.vocabulary ?? {}
  const unknown = CATEGORICAL_FEATURES.filter((col) => {
    const known = vocabulary[col]
    return known !== undefined && !known.includes(value[col])
  })
  if (unknown.length) {
    return fail(
      unknown.map((col) => `${col} "${value[col]}" is not a category known to the model`),
      unknown
    )
  }

  return { valid: true, value }
}
