import type { ErrorKind, ErrorRecord } from '@ocrflow/model';

import { TimeoutError } from 'es-toolkit';

import { MalformedResponseError, UnsupportedFileTypeError } from '../errors';

const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'EPIPE',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

/** Errors raised while reading a local file before anything is sent */
const LOCAL_FILE_ERROR_CODES = new Set(['ENOENT', 'EACCES', 'EISDIR', 'EPERM']);

const TIMEOUT_ERROR_NAMES = new Set(['TimeoutError', 'RequestTimeoutError']);
const ABORT_ERROR_NAMES = new Set(['AbortError', 'RequestAbortedError']);
const CONNECTION_ERROR_NAMES = new Set(['ConnectionError']);
/** Raised by the Mistral SDK when a response does not match its schema */
const VALIDATION_ERROR_NAMES = new Set([
  'SDKValidationError',
  'ResponseValidationError',
]);

/**
 * Map anything a backend throws to an ErrorRecord.
 *
 * HTTP status is read from a numeric `statusCode` or `status` property;
 * retry-after hints from a `retryAfterMs` property or a `Retry-After`
 * header on `rawResponse` / `response`.
 *
 * @param now - epoch milliseconds, used to turn an HTTP-date Retry-After into a delay
 */
export function classifyBackendError(
  error: unknown,
  now: number = Date.now(),
): ErrorRecord {
  const message = errorMessage(error);

  if (
    error instanceof MalformedResponseError ||
    hasName(error, VALIDATION_ERROR_NAMES)
  ) {
    const result = record('MalformedResponse', message, false);
    const status = readStatus(error);
    if (status !== undefined) {
      result.backendStatus = status;
    }
    return result;
  }

  if (error instanceof UnsupportedFileTypeError) {
    return record('UnsupportedFileType', message, false);
  }

  if (error instanceof TimeoutError || hasName(error, TIMEOUT_ERROR_NAMES)) {
    return record('Timeout', message, true);
  }

  if (hasName(error, ABORT_ERROR_NAMES)) {
    return record('Cancelled', message, false);
  }

  const status = readStatus(error);
  if (status !== undefined) {
    return classifyStatus(error, status, message, now);
  }

  if (isNetworkError(error)) {
    return record('Transient', message, true);
  }

  const code = readCode(error);
  if (code !== undefined && LOCAL_FILE_ERROR_CODES.has(code)) {
    return record('InvalidRequest', message, false);
  }

  return record('BackendFault', message, true);
}

function classifyStatus(
  error: unknown,
  status: number,
  message: string,
  now: number,
): ErrorRecord {
  if (status === 429 || status === 503) {
    const result: ErrorRecord = {
      ...record('RateLimited', message, true),
      backendStatus: status,
    };
    const retryAfterMs = readRetryAfterMs(error, now);
    if (retryAfterMs !== undefined) {
      result.retryAfterMs = retryAfterMs;
    }
    return result;
  }

  if (status >= 500) {
    return { ...record('BackendFault', message, true), backendStatus: status };
  }

  if (status >= 400) {
    return {
      ...record('InvalidRequest', message, false),
      backendStatus: status,
    };
  }

  // A non-error status that still failed means the body was unusable
  return {
    ...record('MalformedResponse', message, false),
    backendStatus: status,
  };
}

function record(
  kind: ErrorKind,
  message: string,
  retryable: boolean,
): ErrorRecord {
  return { kind, message, retryable };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}

function hasName(error: unknown, names: Set<string>): boolean {
  return (
    isRecord(error) && typeof error.name === 'string' && names.has(error.name)
  );
}

function readStatus(error: unknown): number | undefined {
  if (!isRecord(error)) {
    return undefined;
  }

  for (const value of [error.statusCode, error.status]) {
    if (
      typeof value === 'number' &&
      Number.isInteger(value) &&
      value >= 100 &&
      value <= 599
    ) {
      return value;
    }
  }
  return undefined;
}

function readCode(error: unknown): string | undefined {
  return isRecord(error) && typeof error.code === 'string'
    ? error.code
    : undefined;
}

function isNetworkError(error: unknown): boolean {
  if (hasName(error, CONNECTION_ERROR_NAMES)) {
    return true;
  }

  if (error instanceof TypeError && error.message === 'fetch failed') {
    return true;
  }

  const code = readCode(error);
  if (code !== undefined && NETWORK_ERROR_CODES.has(code)) {
    return true;
  }

  const cause = isRecord(error) ? error.cause : undefined;
  const causeCode = readCode(cause);
  return causeCode !== undefined && NETWORK_ERROR_CODES.has(causeCode);
}

function readRetryAfterMs(error: unknown, now: number): number | undefined {
  if (!isRecord(error)) {
    return undefined;
  }

  if (
    typeof error.retryAfterMs === 'number' &&
    Number.isFinite(error.retryAfterMs) &&
    error.retryAfterMs >= 0
  ) {
    return error.retryAfterMs;
  }

  for (const response of [error.rawResponse, error.response]) {
    const header = readRetryAfterHeader(response);
    if (header !== undefined) {
      return parseRetryAfter(header, now);
    }
  }
  return undefined;
}

function readRetryAfterHeader(response: unknown): string | undefined {
  if (!isRecord(response)) {
    return undefined;
  }

  const { headers } = response;
  if (headers instanceof Headers) {
    return headers.get('retry-after') ?? undefined;
  }

  if (isRecord(headers)) {
    const value = headers['retry-after'] ?? headers['Retry-After'];
    return typeof value === 'string' ? value : undefined;
  }

  return undefined;
}

/**
 * Parse a Retry-After header value: delta seconds or an HTTP date.
 */
export function parseRetryAfter(
  value: string,
  now: number = Date.now(),
): number | undefined {
  const trimmed = value.trim();

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}
