import { MetricsTracker } from '../../src/services/MetricsTracker'

describe('MetricsTracker', () => {
  test('counts predictions by outcome and errors by reason code', async () => {
    const m = new MetricsTracker()
    m.incPrediction('success')
    m.incPrediction('success')
    m.incPrediction('rejected')
    m.recordError('VALIDATION_ERROR')

    const text = await m.snapshot()
    expect(text).toContain('traffic_predictions_total{outcome="success"} 2')
    expect(text).toContain('traffic_predictions_total{outcome="rejected"} 1')
    expect(text).toContain('traffic_errors_total{reason_code="VALIDATION_ERROR"} 1')
  })

  test('model gauge reflects the load result', async () => {
    const m = new MetricsTracker()
    m.setModelLoaded(true)
    expect(await m.snapshot()).toContain('traffic_model_loaded 1')
    m.setModelLoaded(false)
    expect(await m.snapshot()).toContain('traffic_model_loaded 0')
  })

  test('latency ignores impossible samples', async () => {
    const m = new MetricsTracker()
    m.observeLatency(3)
    m.observeLatency(-1)
    m.observeLatency(NaN)
    expect(await m.snapshot()).toContain('traffic_prediction_latency_ms_count 1')
  })

  test('separate trackers do not share registries', async () => {
    const a = new MetricsTracker()
    const b = new MetricsTracker()
    a.incPrediction('failed')
    expect(await b.snapshot()).not.toContain('outcome="failed"')
  })
})
