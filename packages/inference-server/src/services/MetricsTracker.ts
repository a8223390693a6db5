import client from 'prom-client'

export type PredictionOutcome = 'success' | 'rejected' | 'unavailable' | 'failed'

export class MetricsTracker {
  private static instance: MetricsTracker | undefined

  readonly registry: client.Registry

  private predictionsCounter: client.Counter<'outcome'>
  private errorsCounter: client.Counter<'reason_code'>
  public predictionLatency: client.Histogram<string>
  public modelLoaded: client.Gauge<string>

  constructor(registry: client.Registry = new client.Registry()) {
    this.registry = registry

    this.predictionsCounter = new client.Counter({
      name: 'traffic_predictions_total',
      help: 'Prediction requests by outcome',
      labelNames: ['outcome'],
      registers: [registry]
    })
    this.errorsCounter = new client.Counter({
      name: 'traffic_errors_total',
      help: 'Error responses by reason code',
      labelNames: ['reason_code'],
      registers: [registry]
    })

    // validation + inference, excluding transport
    this.predictionLatency = new client.Histogram({
      name: 'traffic_prediction_latency_ms',
      help: 'Prediction latency (ms)',
      buckets: [0.1, 0.25, 0.5, 1, 2, 5, 10, 20, 50, 100],
      registers: [registry]
    })

    this.modelLoaded = new client.Gauge({
      name: 'traffic_model_loaded',
      help: '1 when the predictor loaded at startup, 0 otherwise',
      registers: [registry]
    })
  }

  static getInstance(): MetricsTracker {
    if (!MetricsTracker.instance) {
      const tracker = new MetricsTracker()
      client.collectDefaultMetrics({ register: tracker.registry })
      MetricsTracker.instance = tracker
    }
    return MetricsTracker.instance
  }

  incPrediction(outcome: PredictionOutcome, count = 1) { this.predictionsCounter.inc({ outcome }, count) }
  recordError(reason_code: string, count = 1) { this.errorsCounter.inc({ reason_code }, count) }
  observeLatency(ms: number) { if (ms >= 0 && Number.isFinite(ms)) this.predictionLatency.observe(ms) }
  setModelLoaded(loaded: boolean) { this.modelLoaded.set(loaded ? 1 : 0) }

  async snapshot(): Promise<string> {
    return this.registry.metrics()
  }
}

export default MetricsTracker
