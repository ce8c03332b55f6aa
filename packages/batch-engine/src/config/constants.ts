/**
 * Configuration constants for the batch engine
 */
export const OCR_ENGINE = {
  /**
   * File extensions the OCR backend accepts (lower-case, without the dot)
   */
  SUPPORTED_EXTENSIONS: ['pdf', 'png', 'jpg', 'jpeg', 'tiff', 'tif', 'bmp'],

  /**
   * Subset of SUPPORTED_EXTENSIONS that are sent to the backend as images
   */
  IMAGE_EXTENSIONS: ['png', 'jpg', 'jpeg', 'tiff', 'tif', 'bmp'],

  /**
   * Input descriptors starting with one of these are treated as URLs
   */
  URL_PREFIXES: ['http://', 'https://'],

  /**
   * Prefix and minimum digit count of generated WorkItem ids (item-001, item-002, ...)
   */
  ITEM_ID_PREFIX: 'item-',
  ITEM_ID_MIN_DIGITS: 3,

  /**
   * Maximum in-flight backend calls per batch
   */
  DEFAULT_CONCURRENCY: 4,

  /**
   * Per-call backend timeout in milliseconds
   */
  DEFAULT_CALL_TIMEOUT_MS: 120000,

  /**
   * Largest delay a Node.js timer accepts; longer ones fire after 1ms
   */
  MAX_TIMER_DELAY_MS: 2_147_483_647,
} as const;

/**
 * Configuration constants for RetryPolicy
 */
export const RETRY_POLICY = {
  /**
   * Total attempts per item, including the first one
   */
  DEFAULT_MAX_ATTEMPTS: 3,

  /**
   * Delay before the second attempt; doubles on every further attempt
   */
  DEFAULT_BASE_DELAY_MS: 1000,

  /**
   * Upper bound of the computed backoff delay
   */
  DEFAULT_MAX_DELAY_MS: 30000,
} as const;

/**
 * Configuration constants for MistralOcrBackend
 */
export const MISTRAL_OCR = {
  DEFAULT_MODEL: 'mistral-ocr-latest',

  /**
   * Purpose tag for uploaded files
   */
  UPLOAD_PURPOSE: 'ocr',
} as const;

const supportedExtensions: readonly string[] = OCR_ENGINE.SUPPORTED_EXTENSIONS;
const imageExtensions: readonly string[] = OCR_ENGINE.IMAGE_EXTENSIONS;

export function isUrl(input: string): boolean {
  return OCR_ENGINE.URL_PREFIXES.some((prefix) => input.startsWith(prefix));
}

export function isSupportedExtension(extension: string): boolean {
  return supportedExtensions.includes(extension.toLowerCase());
}

export function isImageExtension(extension: string): boolean {
  return imageExtensions.includes(extension.toLowerCase());
}
