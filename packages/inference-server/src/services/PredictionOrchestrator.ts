/**
 * PredictionOrchestrator
 *
 * Turns a validated FeatureRecord into a PredictionResult:
 *   1. refuse immediately when the model never loaded (ModelUnavailableError)
 *   2. assemble the vector in FEATURE_COLUMNS order
 *   3. call the predictor synchronously
 *   4. truncate toward zero, clamp negatives to zero
 *   5. attach the configured model version
 *
 * Any failure in 2-4 is re-thrown as PredictionFailedError; the predictor's own
 * error types never reach the caller. No retries: inference is deterministic.
 */
import { ClosedVocabulary, FEATURE_COLUMNS, FeatureRecord, PredictionResult } from '@metro-traffic/dto'
import { ModelUnavailableError, PredictionFailedError } from '@metro-traffic/reasons'
import { FeatureVector } from '../model/types'
import { ModelState, isModelLoaded } from './ModelState'

export interface OrchestratorOptions {
  modelVersion: string
}

export function assembleFeatureVector(record: FeatureRecord): FeatureVector {
  return {
    columns: FEATURE_COLUMNS,
    values: FEATURE_COLUMNS.map((col) => record[col])
  }
}

export function toVehicleCount(raw: number): number {
  if (!Number.isFinite(raw)) throw new RangeError(`Predictor returned a non-finite estimate: ${raw}`)
  // traffic volume cannot be negative
  return Math.max(0, Math.trunc(raw))
}

const OPEN_VOCABULARY: ClosedVocabulary = Object.freeze({})

export class PredictionOrchestrator {
  constructor(private readonly model: ModelState, private readonly opts: OrchestratorOptions) {}

  /** Closed vocabularies the validator should enforce; empty when the model is unloaded. */
  get vocabulary(): ClosedVocabulary {
    return isModelLoaded(this.model) ? this.model.predictor.vocabulary : OPEN_VOCABULARY
  }

  predict(record: FeatureRecord): PredictionResult {
    const model = this.model
    if (!isModelLoaded(model)) throw new ModelUnavailableError()

    let volume: number
    try {
      const vector = assembleFeatureVector(record)
      volume = toVehicleCount(model.predictor.predict(vector))
    } catch (e) {
      throw new PredictionFailedError(e)
    }

    return Object.freeze({ predicted_traffic_volume: volume, model_version: this.opts.modelVersion })
  }
}
