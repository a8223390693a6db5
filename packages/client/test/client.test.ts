import nock from 'nock'
import { TrafficVolumeClient, TrafficVolumeClientError } from '../src/client'

async function caught(p: Promise<unknown>): Promise<TrafficVolumeClientError> {
  try {
    await p
  } catch (e) {
    if (e instanceof TrafficVolumeClientError) return e
    throw e
  }
  throw new Error('expected the call to fail')
}

describe('TrafficVolumeClient', () => {
  const BASE_URL = 'http://traffic.test:8000'

  afterEach(() => {
    nock.cleanAll()
  })

  test('predict posts the features and returns the result', async () => {
    nock(BASE_URL)
      .post('/predict', { hour: 17, is_rush_hour: 1 })
      .reply(200, { predicted_traffic_volume: 4523, model_version: '1.0.0' })

    const client = new TrafficVolumeClient(`${BASE_URL}/`)
    await expect(client.predict({ hour: 17, is_rush_hour: 1 })).resolves.toEqual({
      predicted_traffic_volume: 4523,
      model_version: '1.0.0'
    })
  })

  test('forwards the correlation id', async () => {
    nock(BASE_URL, { reqheaders: { 'x-corr-id': 'corr_client_1' } })
      .post('/predict', {})
      .reply(200, { predicted_traffic_volume: 1, model_version: '1.0.0' })

    const client = new TrafficVolumeClient({ baseUrl: BASE_URL })
    const res = await client.predict({}, { corrId: 'corr_client_1' })
    expect(res.predicted_traffic_volume).toBe(1)
  })

  test('server errors surface the reason code and detail', async () => {
    nock(BASE_URL).post('/predict').reply(400, { error: 'VALIDATION_ERROR', detail: 'hour must be <= 23' })

    const err = await caught(new TrafficVolumeClient(BASE_URL).predict({ hour: 24 }))
    expect(err.statusCode).toBe(400)
    expect(err.code).toBe('VALIDATION_ERROR')
    expect(err.message).toBe('VALIDATION_ERROR: hour must be <= 23')
    expect(err.data).toEqual({ error: 'VALIDATION_ERROR', detail: 'hour must be <= 23' })
  })

  test('non-conforming error bodies keep only the status', async () => {
    nock(BASE_URL).post('/predict').reply(502, '<html>bad gateway</html>')

    const err = await caught(new TrafficVolumeClient(BASE_URL).predict())
    expect(err.statusCode).toBe(502)
    expect(err.message).toBe('Server error 502')
    expect(err.data).toBeUndefined()
    expect(err.code).toBeUndefined()
  })

  test('health returns an unhealthy body instead of throwing', async () => {
    const body = { status: 'unhealthy', model_loaded: false, timestamp: '2024-06-03T17:00:00.000Z' }
    nock(BASE_URL).get('/health').reply(503, body)

    await expect(new TrafficVolumeClient(BASE_URL).health()).resolves.toEqual(body)
  })

  test('info returns the service description', async () => {
    const body = {
      message: 'Metro Interstate Traffic Volume Prediction API',
      status: 'running',
      model_loaded: true,
      model_status: 'loaded',
      version: '1.0.0',
      endpoints: { predict: 'POST /predict - Make traffic volume prediction' }
    }
    nock(BASE_URL).get('/').reply(200, body)

    await expect(new TrafficVolumeClient(BASE_URL).info()).resolves.toEqual(body)
  })

  test('timeouts map to 408', async () => {
    nock(BASE_URL).post('/predict').delay(500).reply(200, { predicted_traffic_volume: 1, model_version: '1.0.0' })

    const err = await caught(new TrafficVolumeClient({ baseUrl: BASE_URL, timeoutMs: 50 }).predict())
    expect(err.statusCode).toBe(408)
    expect(err.message).toBe(`Request to ${BASE_URL} timed out`)
  })

  test('connection failures map to 503', async () => {
    nock(BASE_URL).post('/predict').replyWithError({ code: 'ECONNREFUSED', message: 'connect ECONNREFUSED' })

    const err = await caught(new TrafficVolumeClient(BASE_URL).predict())
    expect(err.statusCode).toBe(503)
    expect(err.message.startsWith(`Service unreachable at ${BASE_URL}`)).toBe(true)
  })
})
