// API Error
export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

// API Response Wrappers
export interface ApiSuccess<T> {
  success: true;
  data: T;
  requestId?: string;
}

export interface ApiFailure {
  success: false;
  error: ApiError;
  requestId?: string;
}

export type ApiResponse<T> = ApiSuccess<T> | ApiFailure;

// Error Codes
export const ApiErrorCode = {
  BAD_REQUEST: 'BAD_REQUEST',
  UNAUTHORIZED: 'UNAUTHORIZED',
  NOT_FOUND: 'NOT_FOUND',
  UNKNOWN_SANDBOX_TYPE: 'UNKNOWN_SANDBOX_TYPE',
  PROVISIONING_FAILED: 'PROVISIONING_FAILED',
  PORTS_EXHAUSTED: 'PORTS_EXHAUSTED',
  BACKEND_UNAVAILABLE: 'BACKEND_UNAVAILABLE',
  STATE_STORE_ERROR: 'STATE_STORE_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
} as const;

export type ApiErrorCode = (typeof ApiErrorCode)[keyof typeof ApiErrorCode];
