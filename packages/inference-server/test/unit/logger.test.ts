import pino from 'pino'
import { getLogger, logHttp, logModelLoaded, logModelUnavailable, setLogger } from '../../src/utils/logger'

type Line = Record<string, unknown>

function capture(): Line[] {
  const lines: Line[] = []
  setLogger(pino({ level: 'info' }, { write: (s: string) => { lines.push(JSON.parse(s)) } }))
  return lines
}

describe('logger', () => {
  const original = getLogger()
  afterEach(() => setLogger(original))

  test('request lines are info below 500', () => {
    const lines = capture()
    logHttp({ path: '/predict', method: 'POST', status: 400, corr_id: 'corr_1', latency_ms: 3 })
    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatchObject({ level: 30, event: 'http.request', path: '/predict', method: 'POST', status: 400, corr_id: 'corr_1', latency_ms: 3 })
  })

  test('request lines are warn at 500 and above', () => {
    const lines = capture()
    logHttp({ path: '/predict', method: 'POST', status: 500 })
    expect(lines[0]).toMatchObject({ level: 40, event: 'http.request', status: 500 })
  })

  test('model lifecycle events', () => {
    const lines = capture()
    logModelLoaded({ artifact_path: '/m.json', model_type: 'linear_pipeline' })
    logModelUnavailable({ artifact_path: '/m.json', error: 'Model file not found: /m.json' })
    expect(lines[0]).toMatchObject({ level: 30, event: 'model.loaded', artifact_path: '/m.json', model_type: 'linear_pipeline' })
    expect(lines[1]).toMatchObject({ level: 50, event: 'model.unavailable', error: 'Model file not found: /m.json' })
  })
})
