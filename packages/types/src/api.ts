export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
}

export interface ApiError {
  code: string;
  message: string;
  requestId: string;
  details?: unknown;
}

export interface HealthCheckResult {
  status: "ok" | "degraded";
  checks: Record<string, boolean>;
}
