// Public surface of the inference server package: the app factory, the prediction
// core it wires together, and the predictor loaders.

export { createApp, AppDeps } from './http'
export { validateFeatureRecord, FeatureRecordSchema, ValidationResult, ValidateOptions } from './validators/featureRecordValidator'
export { PredictionOrchestrator, assembleFeatureVector, toVehicleCount, OrchestratorOptions } from './services/PredictionOrchestrator'
export {
  ModelState,
  LoadedModelState,
  UnloadedModelState,
  initializeModel,
  loadedState,
  unloadedState,
  isModelLoaded,
  readiness
} from './services/ModelState'
export { MetricsTracker, PredictionOutcome } from './services/MetricsTracker'
export { loadPredictor, readArtifact, createPredictor, ModelArtifactError } from './model/loader'
export { ModelArtifact, ModelArtifactSchema } from './model/artifact'
export { Predictor, FeatureVector, FeatureValue } from './model/types'
export { setLogger, getLogger } from './utils/logger'
