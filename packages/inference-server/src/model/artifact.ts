/* Schema of the JSON model artifacts written by the training pipeline. */

import { z } from 'zod'

const ScalerSchema = z.object({
  mean: z.number(),
  scale: z.number().refine((v) => v !== 0, { message: 'scale must be non-zero' }),
})

const CategoricalSchema = z.object({
  categories: z.array(z.string()).min(1),
  // 'ignore' encodes unseen categories as all zeros; 'error' makes the vocabulary closed
  handle_unknown: z.enum(['ignore', 'error']).default('ignore'),
})

export const PreprocessingSchema = z
  .object({
    feature_columns: z.array(z.string()).min(1),
    numeric_scalers: z.record(ScalerSchema).default({}),
    categorical: z.record(CategoricalSchema).default({}),
  })
  .superRefine((p, ctx) => {
    for (const col of [...Object.keys(p.numeric_scalers), ...Object.keys(p.categorical)]) {
      if (!p.feature_columns.includes(col)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${col} is not listed in feature_columns` })
      }
    }
    for (const col of Object.keys(p.numeric_scalers)) {
      if (col in p.categorical) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${col} cannot be both scaled and one-hot encoded` })
      }
    }
  })

export type Preprocessing = z.infer<typeof PreprocessingSchema>

export type TreeNode =
  | { value: number }
  | { feature: string; threshold: number; left: TreeNode; right: TreeNode }

const TreeNodeSchema: z.ZodType<TreeNode> = z.lazy(() =>
  z.union([
    z.object({ value: z.number() }),
    z.object({ feature: z.string(), threshold: z.number(), left: TreeNodeSchema, right: TreeNodeSchema }),
  ])
)

const ArtifactBase = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
  trained_at: z.string().optional(),
  preprocessing: PreprocessingSchema,
})

export const LinearArtifactSchema = ArtifactBase.extend({
  model_type: z.literal('linear_pipeline'),
  intercept: z.number(),
  // keyed by encoded feature: `temp` for numeric columns, `weather_main=Rain` for one-hot columns
  coefficients: z.record(z.number()),
})

export const TreeEnsembleArtifactSchema = ArtifactBase.extend({
  model_type: z.literal('tree_ensemble'),
  aggregation: z.enum(['mean', 'sum']),
  base_score: z.number().default(0),
  learning_rate: z.number().positive().default(1),
  trees: z.array(TreeNodeSchema).min(1),
})

export const ModelArtifactSchema = z.discriminatedUnion('model_type', [LinearArtifactSchema, TreeEnsembleArtifactSchema])

export type LinearArtifact = z.infer<typeof LinearArtifactSchema>
export type TreeEnsembleArtifact = z.infer<typeof TreeEnsembleArtifactSchema>
export type ModelArtifact = z.infer<typeof ModelArtifactSchema>
