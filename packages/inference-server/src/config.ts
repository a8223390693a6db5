// src/config.ts

/**
 * Centralized configuration module for environment variables and constants.
 */

// Load environment variables from .env.inference-server file
import dotenv from 'dotenv'
import path from 'path'
import fs from 'fs'

// Resolve package root for both ts-jest (src) and built (dist/packages/...) layouts
const distMarker = `${path.sep}dist${path.sep}`
const distIdx = __dirname.lastIndexOf(distMarker)
const srcDir = distIdx !== -1 ? __dirname.slice(0, distIdx) + __dirname.slice(distIdx + distMarker.length - 1) : __dirname
export const PACKAGE_ROOT = path.resolve(srcDir, '..')

// Try to load .env.inference-server from package root, with cwd fallback
const candidateEnvPaths = [
  path.join(PACKAGE_ROOT, '.env.inference-server'),
  path.join(process.cwd(), '.env.inference-server')
]
for (const p of candidateEnvPaths) {
  if (fs.existsSync(p)) {
    dotenv.config({ path: p })
    break
  }
}

export const DEFAULT_MODEL_PATH = path.join(PACKAGE_ROOT, 'models', 'traffic_model_pipeline.json')

export const ENV = {
  NODE_ENV: process.env.NODE_ENV || 'development',
  PORT: process.env.PORT ? Number(process.env.PORT) : 8000,

  // Trained predictor artifact; absence leaves the model unloaded rather than crashing startup
  MODEL_PATH: process.env.MODEL_PATH ? path.resolve(process.env.MODEL_PATH) : DEFAULT_MODEL_PATH,
  // Reported with every prediction. Fixed per deployment.
  MODEL_VERSION: process.env.MODEL_VERSION || '1.0.0',

  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
  JSON_BODY_LIMIT: process.env.JSON_BODY_LIMIT || '100kb',
  CORS_ALLOW_ORIGIN: process.env.CORS_ALLOW_ORIGIN || '*',
}

export const CONSTANTS = {
  SERVICE_NAME: process.env.SERVICE_NAME || 'Metro Interstate Traffic Volume Prediction API',
  API_VERSION: '1.0.0',
}
