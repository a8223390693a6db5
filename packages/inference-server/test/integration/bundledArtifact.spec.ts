import { FEATURE_COLUMNS, FEATURE_DEFAULTS } from '@metro-traffic/dto'
import { DEFAULT_MODEL_PATH } from '../../src/config'
import { loadPredictor } from '../../src/model/loader'
import { PredictionOrchestrator } from '../../src/services/PredictionOrchestrator'
import { initializeModel } from '../../src/services/ModelState'
import { RUSH_HOUR_RECORD } from '../helpers/stubs'

describe('bundled model artifact', () => {
  it('is trained on the canonical feature columns', () => {
    expect(loadPredictor(DEFAULT_MODEL_PATH).featureColumns).toEqual([...FEATURE_COLUMNS])
  })

  it('produces non-negative whole vehicle counts', () => {
    const orchestrator = new PredictionOrchestrator(initializeModel(DEFAULT_MODEL_PATH), { modelVersion: '1.0.0' })
    for (const rec of [FEATURE_DEFAULTS, RUSH_HOUR_RECORD, { ...FEATURE_DEFAULTS, hour: 3, is_rush_hour: 0 as const }]) {
      const { predicted_traffic_volume } = orchestrator.predict(rec)
      expect(Number.isInteger(predicted_traffic_volume)).toBe(true)
      expect(predicted_traffic_volume).toBeGreaterThanOrEqual(0)
    }
  })

  it('ranks evening rush hour above the small hours', () => {
    const orchestrator = new PredictionOrchestrator(initializeModel(DEFAULT_MODEL_PATH), { modelVersion: '1.0.0' })
    const rush = orchestrator.predict(RUSH_HOUR_RECORD).predicted_traffic_volume
    const night = orchestrator.predict({ ...RUSH_HOUR_RECORD, hour: 3, is_rush_hour: 0 }).predicted_traffic_volume
    expect(rush).toBeGreaterThan(night)
  })
})
