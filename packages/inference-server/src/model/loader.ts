import fs from 'fs'
import { ZodError } from 'zod'
import { ModelArtifact, ModelArtifactSchema } from './artifact'
import { LinearPipelinePredictor } from './LinearPipelinePredictor'
import { TreeEnsemblePredictor } from './TreeEnsemblePredictor'
import { Predictor } from './types'

export class ModelArtifactError extends Error {
  constructor(message: string, readonly artifactPath: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ModelArtifactError'
  }
}

function formatIssues(err: ZodError): string {
  return err.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ')
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT'
}

export function readArtifact(artifactPath: string): ModelArtifact {
  let raw: string
  try {
    raw = fs.readFileSync(artifactPath, 'utf8')
  } catch (e) {
    if (isMissingFile(e)) throw new ModelArtifactError(`Model file not found: ${artifactPath}`, artifactPath, { cause: e })
    throw new ModelArtifactError(`Model file could not be read: ${artifactPath}`, artifactPath, { cause: e })
  }

  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (e) {
    throw new ModelArtifactError(`Model file is not valid JSON: ${artifactPath}`, artifactPath, { cause: e })
  }

  const parsed = ModelArtifactSchema.safeParse(json)
  if (!parsed.success) {
    throw new ModelArtifactError(`Model file failed schema validation: ${formatIssues(parsed.error)}`, artifactPath)
  }
  return parsed.data
}

export function createPredictor(artifact: ModelArtifact): Predictor {
  switch (artifact.model_type) {
    case 'linear_pipeline':
      return new LinearPipelinePredictor(artifact)
    case 'tree_ensemble':
      return new TreeEnsemblePredictor(artifact)
  }
}

export function loadPredictor(artifactPath: string): Predictor {
  return createPredictor(readArtifact(artifactPath))
}
