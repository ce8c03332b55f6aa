import type { ErrorKind } from '@ocrflow/model';
import type { ServerResponse } from 'node:http';

/**
 * Any origin may call the API from a browser.
 */
export const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': '*',
  'Access-Control-Max-Age': '600',
} as const;

export function sendJson(
  res: ServerResponse,
  status: number,
  body: unknown,
): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    ...CORS_HEADERS,
    'Content-Type': 'application/json; charset=utf-8',
    'Content-Length': Buffer.byteLength(payload),
  });
  res.end(payload);
}

/**
 * Answer a CORS preflight.
 */
export function sendPreflight(res: ServerResponse): void {
  res.writeHead(204, CORS_HEADERS);
  res.end();
}

export function sendError(
  res: ServerResponse,
  status: number,
  error: string,
  code: string,
  details?: unknown,
): void {
  sendJson(
    res,
    status,
    details === undefined ? { error, code } : { error, code, details },
  );
}

/**
 * HTTP status for a document that failed with the given kind.
 */
export function statusForErrorKind(kind: ErrorKind): number {
  switch (kind) {
    case 'InvalidRequest':
    case 'InvalidInput':
    case 'UnsupportedFileType':
      return 400;
    case 'RateLimited':
      return 429;
    case 'Timeout':
      return 504;
    case 'Cancelled':
      return 503;
    default:
      return 502;
  }
}
