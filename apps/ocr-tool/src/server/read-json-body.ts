/**
 * The request body could not be read as JSON.
 */
export class RequestBodyError extends Error {
  public readonly name = 'RequestBodyError';

  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string,
  ) {
    super(message);
  }
}

export const DEFAULT_MAX_BODY_BYTES = 50 * 1024 * 1024;

/**
 * Read a request body and parse it as JSON.
 *
 * @throws RequestBodyError when the body is empty, too large or not JSON
 */
export async function readJsonBody(
  req: AsyncIterable<Buffer | string>,
  maxBytes: number = DEFAULT_MAX_BODY_BYTES,
): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of req) {
    const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    size += buffer.length;
    if (size > maxBytes) {
      throw new RequestBodyError(
        `Request body exceeds ${maxBytes} bytes`,
        413,
        'PAYLOAD_TOO_LARGE',
      );
    }
    chunks.push(buffer);
  }

  const text = Buffer.concat(chunks).toString('utf-8');
  if (text.trim() === '') {
    throw new RequestBodyError('Request body is empty', 400, 'INVALID_JSON');
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new RequestBodyError(
      'Request body is not valid JSON',
      400,
      'INVALID_JSON',
    );
  }
}
