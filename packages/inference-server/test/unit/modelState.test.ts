import { ModelStatus } from '@metro-traffic/dto'
import {
  initializeModel,
  isModelLoaded,
  loadedState,
  readiness,
  unloadedState
} from '../../src/services/ModelState'
import { fixture, stubPredictor } from '../helpers/stubs'

describe('initializeModel', () => {
  test('a valid artifact yields a loaded state', () => {
    const state = initializeModel(fixture('linear_small.json'))
    expect(state.status).toBe(ModelStatus.LOADED)
    expect(isModelLoaded(state)).toBe(true)
    if (isModelLoaded(state)) {
      expect(state.predictor.modelType).toBe('linear_pipeline')
      expect(state.artifactPath).toBe(fixture('linear_small.json'))
    }
  })

  test('a missing artifact leaves the model unloaded instead of throwing', () => {
    const missing = fixture('nowhere.json')
    const state = initializeModel(missing)
    expect(state).toEqual({ status: ModelStatus.UNLOADED, artifactPath: missing, error: `Model file not found: ${missing}` })
    expect(Object.isFrozen(state)).toBe(true)
  })

  test('a broken artifact leaves the model unloaded', () => {
    const state = initializeModel(fixture('missing_intercept.json'))
    expect(isModelLoaded(state)).toBe(false)
    if (!isModelLoaded(state)) expect(state.error).toBe('Model file failed schema validation: intercept: Required')
  })

  test('loader failures of any kind are captured', () => {
    const state = initializeModel('/models/x.json', () => {
      throw new Error('disk on fire')
    })
    expect(state).toEqual({ status: ModelStatus.UNLOADED, artifactPath: '/models/x.json', error: 'disk on fire' })
  })

  test('loading does not run inference', () => {
    const predictor = stubPredictor(() => 1)
    const state = initializeModel('/models/stub.json', () => predictor)
    expect(isModelLoaded(state)).toBe(true)
    expect(predictor.predict).not.toHaveBeenCalled()
  })
})

describe('readiness', () => {
  const now = new Date('2024-06-03T17:00:00Z')

  test('healthy when loaded', () => {
    const state = loadedState(stubPredictor(() => 1), '/models/stub.json', now)
    expect(state.loadedAt).toBe('2024-06-03T17:00:00.000Z')
    expect(readiness(state, now)).toEqual({ status: 'healthy', model_loaded: true, timestamp: '2024-06-03T17:00:00.000Z' })
  })

  test('unhealthy when unloaded', () => {
    expect(readiness(unloadedState('missing'), now)).toEqual({
      status: 'unhealthy',
      model_loaded: false,
      timestamp: '2024-06-03T17:00:00.000Z'
    })
  })

  test('never consults the predictor', () => {
    const predictor = stubPredictor(() => 1)
    readiness(loadedState(predictor, '/models/stub.json'))
    expect(predictor.predict).not.toHaveBeenCalled()
  })
})
