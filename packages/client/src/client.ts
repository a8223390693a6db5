import axios, { AxiosInstance, AxiosRequestConfig } from 'axios'
import { ClientConfig, ErrorBody, FeatureInput, HealthResponse, PredictionResult, RequestOptions, ServiceInfo, isErrorBody } from './types'

export interface ClientErrorDetails {
  statusCode: number
  message: string
  data?: ErrorBody
}

export class TrafficVolumeClientError extends Error {
  public readonly statusCode: number
  public readonly data?: ErrorBody

  constructor(details: ClientErrorDetails) {
    super(details.message)
    this.name = 'TrafficVolumeClientError'
    this.statusCode = details.statusCode
    this.data = details.data
  }

  /** Reason code from the server body, when the server answered. */
  get code(): string | undefined {
    return this.data?.error
  }
}

export class TrafficVolumeClient {
  private readonly http: AxiosInstance
  private readonly baseUrl: string

  constructor(cfg: ClientConfig | string) {
    const config = typeof cfg === 'string' ? { baseUrl: cfg } : cfg
    this.baseUrl = config.baseUrl.replace(/\/$/, '')
    this.http = axios.create({
      baseURL: this.baseUrl,
      timeout: config.timeoutMs ?? 5000,
      headers: {
        'Content-Type': 'application/json'
      }
    })
  }

  /**
   * Request a traffic volume estimate. Omitted fields take the server defaults.
   * @throws TrafficVolumeClientError with the server's `{ error, detail }` body on 4xx/5xx
   */
  async predict(input: FeatureInput = {}, opts?: RequestOptions): Promise<PredictionResult> {
    try {
      const res = await this.http.post<PredictionResult>('/predict', input, this.requestConfig(opts))
      return res.data
    } catch (err) {
      throw this.toClientError(err)
    }
  }

  /** Readiness; an unhealthy server answers 503 with a body, which is returned rather than thrown. */
  async health(opts?: RequestOptions): Promise<HealthResponse> {
    try {
      const res = await this.http.get<HealthResponse>('/health', {
        ...this.requestConfig(opts),
        validateStatus: (s) => s === 200 || s === 503
      })
      return res.data
    } catch (err) {
      throw this.toClientError(err)
    }
  }

  async info(opts?: RequestOptions): Promise<ServiceInfo> {
    try {
      const res = await this.http.get<ServiceInfo>('/', this.requestConfig(opts))
      return res.data
    } catch (err) {
      throw this.toClientError(err)
    }
  }

  private requestConfig(opts?: RequestOptions): AxiosRequestConfig {
    return opts?.corrId ? { headers: { 'x-corr-id': opts.corrId } } : {}
  }

  private toClientError(err: unknown): TrafficVolumeClientError {
    if (axios.isAxiosError(err)) {
      if (err.response) {
        // Server responded with an error status
        const data: unknown = err.response.data
        const body = isErrorBody(data) ? data : undefined
        return new TrafficVolumeClientError({
          statusCode: err.response.status,
          message: body ? `${body.error}: ${body.detail}` : `Server error ${err.response.status}`,
          data: body
        })
      }
      if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
        return new TrafficVolumeClientError({ statusCode: 408, message: `Request to ${this.baseUrl} timed out` })
      }
      return new TrafficVolumeClientError({ statusCode: 503, message: `Service unreachable at ${this.baseUrl}: ${err.message}` })
    }
    const message = err instanceof Error ? err.message : String(err)
    return new TrafficVolumeClientError({ statusCode: 500, message: message || 'Unknown client error' })
  }
}
