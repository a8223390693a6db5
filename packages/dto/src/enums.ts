export enum ModelStatus {
  LOADED = "loaded",
  UNLOADED = "unloaded",
}

export enum ReasonCategory {
  CLIENT = "CLIENT",
  MODEL = "MODEL",
  INTERNAL = "INTERNAL",
}

export type ReasonCode =
  | "VALIDATION_ERROR"
  | "CLIENT_PAYLOAD_TOO_LARGE"
  | "CLIENT_UNSUPPORTED_MEDIA_TYPE"
  | "CLIENT_NOT_FOUND"
  | "MODEL_UNAVAILABLE"
  | "PREDICTION_FAILED"
  | "INTERNAL_ERROR";

export interface ReasonDetail {
  code: ReasonCode;
  category: ReasonCategory;
  http_status: number;
  message: string;
  context?: Record<string, string | number | boolean>;
}

/** Body of every non-2xx response. `error` is the stable reason code. */
export interface ErrorBody {
  error: ReasonCode;
  detail: string;
}
