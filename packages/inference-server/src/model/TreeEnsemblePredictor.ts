import type { ClosedVocabulary } from '@metro-traffic/dto'
import { TreeEnsembleArtifact, TreeNode } from './artifact'
import { FeatureEncoder } from './FeatureEncoder'
import { FeatureVector, Predictor } from './types'

/**
 * Regression tree ensemble. `mean` aggregation matches a random forest,
 * `sum` a boosted ensemble scaled by the learning rate.
 */
export class TreeEnsemblePredictor implements Predictor {
  readonly modelType = 'tree_ensemble'
  readonly artifactVersion?: string
  private readonly encoder: FeatureEncoder

  constructor(private readonly artifact: TreeEnsembleArtifact) {
    this.encoder = new FeatureEncoder(artifact.preprocessing)
    this.artifactVersion = artifact.version
  }

  get featureColumns(): readonly string[] {
    return this.encoder.columns
  }

  get vocabulary(): ClosedVocabulary {
    return this.encoder.vocabulary
  }

  predict(vector: FeatureVector): number {
    const encoded = this.encoder.encode(vector)
    const { trees, aggregation, base_score, learning_rate } = this.artifact
    const sum = trees.reduce((acc, tree) => acc + walk(tree, encoded), 0)
    return aggregation === 'mean' ? base_score + sum / trees.length : base_score + learning_rate * sum
  }
}

// x <= threshold goes left
function walk(node: TreeNode, encoded: Map<string, number>): number {
  let current = node
  while (!('value' in current)) {
    const x = encoded.get(current.feature) ?? 0
    current = x <= current.threshold ? current.left : current.right
  }
  return current.value
}
