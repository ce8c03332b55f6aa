/**
 * Classification of why an attempt (or a resolution) failed.
 */
export type ErrorKind =
  | 'UnsupportedFileType'
  | 'InvalidInput'
  | 'InvalidRequest'
  | 'Transient'
  | 'RateLimited'
  | 'BackendFault'
  | 'Timeout'
  | 'MalformedResponse'
  | 'Cancelled';

export interface ErrorRecord {
  kind: ErrorKind;
  message: string;
  retryable: boolean;
  /** HTTP status reported by the backend, if any */
  backendStatus?: number;
  /** Backend-provided retry-after hint in milliseconds */
  retryAfterMs?: number;
}
