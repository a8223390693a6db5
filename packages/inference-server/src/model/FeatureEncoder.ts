import { CATEGORICAL_FEATURES, ClosedVocabulary, CategoricalFeature } from '@metro-traffic/dto'
import { Preprocessing } from './artifact'
import { getLogger } from '../utils/logger'
import { FeatureVector } from './types'

/**
 * Turns a FeatureVector into the encoded feature space the models were trained on:
 * standard-scaled numeric columns and one-hot `column=category` indicators.
 * Encoded keys that are absent read as 0.
 */
export class FeatureEncoder {
  readonly columns: readonly string[]
  readonly vocabulary: ClosedVocabulary

  constructor(private readonly preprocessing: Preprocessing) {
    this.columns = Object.freeze([...preprocessing.feature_columns])
    this.vocabulary = Object.freeze(FeatureEncoder.closedVocabulary(preprocessing))
  }

  private static closedVocabulary(p: Preprocessing): ClosedVocabulary {
    const vocab: Partial<Record<CategoricalFeature, readonly string[]>> = {}
    for (const col of CATEGORICAL_FEATURES) {
      const encoding = p.categorical[col]
      if (encoding && encoding.handle_unknown === 'error') vocab[col] = Object.freeze([...encoding.categories])
    }
    return vocab
  }

  encode(vector: FeatureVector): Map<string, number> {
    this.assertColumns(vector)
    const encoded = new Map<string, number>()
    vector.columns.forEach((col, i) => {
      const value = vector.values[i]
      const categorical = this.preprocessing.categorical[col]
      if (categorical) {
        if (typeof value !== 'string') throw new TypeError(`Column ${col} expects a category string, received ${typeof value}`)
        if (categorical.categories.includes(value)) {
          encoded.set(`${col}=${value}`, 1)
        } else if (categorical.handle_unknown === 'error') {
          throw new Error(`Found unknown category "${value}" in column ${col}`)
        }
        return
      }
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new TypeError(`Column ${col} expects a finite number, received ${JSON.stringify(value)}`)
      }
      const scaler = this.preprocessing.numeric_scalers[col]
      encoded.set(col, scaler ? (value - scaler.mean) / scaler.scale : value)
    })
    return encoded
  }

  private assertColumns(vector: FeatureVector): void {
    const expected = this.columns
    const matches =
      vector.columns.length === expected.length &&
      vector.values.length === expected.length &&
      expected.every((c, i) => vector.columns[i] === c)
    if (!matches) {
      // column lists stay in the log; callers only see the summary
      getLogger().error({ event: 'model.column_mismatch', expected: [...expected], received: [...vector.columns] })
      throw new Error('Feature columns do not match the model')
    }
  }
}
