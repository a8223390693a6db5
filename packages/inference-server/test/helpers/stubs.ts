import path from 'path'
import pino from 'pino'
import { FEATURE_COLUMNS, FEATURE_DEFAULTS, FeatureRecord } from '@metro-traffic/dto'
import { FeatureVector, Predictor } from '../../src/model/types'
import { getLogger, setLogger } from '../../src/utils/logger'

export const FIXTURES = path.join(__dirname, '..', 'fixtures')

export function fixture(name: string): string {
  return path.join(FIXTURES, name)
}

/** The example request from the API docs. */
export const RUSH_HOUR_RECORD: FeatureRecord = {
  holiday: 'None',
  temp: 295.15,
  rain_1h: 0.0,
  snow_1h: 0.0,
  clouds_all: 75,
  weather_main: 'Clouds',
  hour: 17,
  day_of_week: 0,
  month: 6,
  is_rush_hour: 1
}

export function record(overrides: Partial<FeatureRecord> = {}): FeatureRecord {
  return { ...FEATURE_DEFAULTS, ...overrides }
}

export type StubPredictor = Predictor & { predict: jest.Mock<number, [FeatureVector]> }

export function stubPredictor(impl: (v: FeatureVector) => number): StubPredictor {
  return {
    modelType: 'stub',
    featureColumns: FEATURE_COLUMNS,
    vocabulary: {},
    predict: jest.fn(impl)
  }
}

export type LogLine = Record<string, unknown>

/** Routes the service logger into an array until `restore` is called. */
export function captureLogs(): { lines: LogLine[]; restore: () => void } {
  const original = getLogger()
  const lines: LogLine[] = []
  setLogger(pino({ level: 'info' }, { write: (s: string) => { lines.push(JSON.parse(s)) } }))
  return { lines, restore: () => setLogger(original) }
}
