/**
 * Process-wide model state.
 *
 * Built exactly once at startup by `initializeModel` and passed by reference
 * into the HTTP layer. There is no reload path: a failed load stays
 * `unloaded` for the lifetime of the process.
 */
import { HealthResponse, ModelStatus } from '@metro-traffic/dto'
import { loadPredictor } from '../model/loader'
import { Predictor } from '../model/types'
import { logModelLoaded, logModelUnavailable } from '../utils/logger'

export interface LoadedModelState {
  readonly status: ModelStatus.LOADED
  readonly predictor: Predictor
  readonly artifactPath: string
  readonly loadedAt: string
}

export interface UnloadedModelState {
  readonly status: ModelStatus.UNLOADED
  readonly artifactPath?: string
  readonly error: string
}

export type ModelState = LoadedModelState | UnloadedModelState

export function loadedState(predictor: Predictor, artifactPath: string, loadedAt = new Date()): LoadedModelState {
  const state: LoadedModelState = { status: ModelStatus.LOADED, predictor, artifactPath, loadedAt: loadedAt.toISOString() }
  return Object.freeze(state)
}

export function unloadedState(error: string, artifactPath?: string): UnloadedModelState {
  const state: UnloadedModelState = { status: ModelStatus.UNLOADED, artifactPath, error }
  return Object.freeze(state)
}

export function isModelLoaded(state: ModelState): state is LoadedModelState {
  return state.status === ModelStatus.LOADED
}

/** Never throws: a missing or broken artifact leaves the service up but unhealthy. */
export function initializeModel(artifactPath: string, load: (p: string) => Predictor = loadPredictor): ModelState {
  try {
    const predictor = load(artifactPath)
    logModelLoaded({ artifact_path: artifactPath, model_type: predictor.modelType, artifact_version: predictor.artifactVersion })
    return loadedState(predictor, artifactPath)
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e)
    logModelUnavailable({ artifact_path: artifactPath, error: message })
    return unloadedState(message, artifactPath)
  }
}

export function readiness(state: ModelState, now = new Date()): HealthResponse {
  const loaded = isModelLoaded(state)
  return {
    status: loaded ? 'healthy' : 'unhealthy',
    model_loaded: loaded,
    timestamp: now.toISOString()
  }
}
