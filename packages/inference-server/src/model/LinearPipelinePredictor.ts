import type { ClosedVocabulary } from '@metro-traffic/dto'
import { LinearArtifact } from './artifact'
import { FeatureEncoder } from './FeatureEncoder'
import { FeatureVector, Predictor } from './types'

/** intercept + Σ coefficient · encoded feature */
export class LinearPipelinePredictor implements Predictor {
  readonly modelType = 'linear_pipeline'
  readonly artifactVersion?: string
  private readonly encoder: FeatureEncoder
  private readonly intercept: number
  private readonly coefficients: ReadonlyArray<readonly [string, number]>

  constructor(artifact: LinearArtifact) {
    this.encoder = new FeatureEncoder(artifact.preprocessing)
    this.artifactVersion = artifact.version
    this.intercept = artifact.intercept
    this.coefficients = Object.freeze(Object.entries(artifact.coefficients))
  }

  get featureColumns(): readonly string[] {
    return this.encoder.columns
  }

  get vocabulary(): ClosedVocabulary {
    return this.encoder.vocabulary
  }

  predict(vector: FeatureVector): number {
    const encoded = this.encoder.encode(vector)
    let total = this.intercept
    for (const [key, weight] of this.coefficients) {
      total += weight * (encoded.get(key) ?? 0)
    }
    return total
  }
}
