export interface EndpointConfig {
  id: string;
  baseUrl: string;
}

export interface ProbeResult {
  readonly id: string;
  /** Candidate URL that validated, or the endpoint's base URL when none did. */
  readonly url: string;
  readonly valid: boolean;
  /** Last HTTP status observed; null when no response was ever obtained. */
  readonly statusCode: number | null;
  readonly message: string;
  readonly attempts: number;
}
