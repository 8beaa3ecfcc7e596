export type HealthStatus = 'healthy' | 'unhealthy' | 'unreachable';

/** Outcome of a single liveness probe, before it is attributed to a listing. */
export interface ProbeOutcome {
  readonly status: HealthStatus;
  readonly status_code: number | null;
  readonly response_time_ms: number;
  readonly error_message: string | null;
  readonly checked_url: string;
  readonly checked_at: string;
}

/** Append-only record of a probe against one listing. */
export interface HealthCheckResult extends ProbeOutcome {
  readonly id: string;
  readonly listing_id: string;
}
