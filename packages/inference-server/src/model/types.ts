import type { ClosedVocabulary } from '@metro-traffic/dto'

export type FeatureValue = number | string

/** One row of model input: column names and values in the order the predictor expects. */
export interface FeatureVector {
  readonly columns: readonly string[]
  readonly values: readonly FeatureValue[]
}

/**
 * A trained model loaded once at startup. Implementations are read-only after
 * construction and safe to share across concurrent requests.
 */
export interface Predictor {
  readonly modelType: string
  /** Version recorded in the artifact by training, if any. */
  readonly artifactVersion?: string
  readonly featureColumns: readonly string[]
  readonly vocabulary: ClosedVocabulary
  /** Raw estimate; may be negative or fractional. Throws on a malformed vector. */
  predict(vector: FeatureVector): number
}
