/**
 * HTTP failure reported by an OCR backend.
 *
 * Backends that talk HTTP themselves throw this so the adapter can classify
 * the status code and honor a retry-after hint.
 */
export class BackendHttpError extends Error {
  public readonly name = 'BackendHttpError';

  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly retryAfterMs?: number,
  ) {
    super(message);
  }
}

/**
 * The backend answered, but the answer is empty or does not have the expected shape.
 */
export class MalformedResponseError extends Error {
  public readonly name = 'MalformedResponseError';

  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
  }
}
