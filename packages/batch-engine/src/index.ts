export { ResultAggregator } from './aggregator/result-aggregator';
export { BackendClientAdapter } from './backend/backend-client-adapter';
export type { BackendClientAdapterOptions } from './backend/backend-client-adapter';
export {
  classifyBackendError,
  parseRetryAfter,
} from './backend/error-classifier';
export { MistralOcrBackend } from './backend/mistral-ocr-backend';
export type {
  MistralOcrApi,
  MistralOcrBackendOptions,
} from './backend/mistral-ocr-backend';
export { toBackendRequest } from './backend/ocr-backend';
export type {
  OcrBackend,
  OcrBackendRequest,
  OcrClient,
} from './backend/ocr-backend';
export { ocrPayloadSchema } from './backend/ocr-payload-schema';
export {
  MISTRAL_OCR,
  OCR_ENGINE,
  RETRY_POLICY,
  isImageExtension,
  isSupportedExtension,
  isUrl,
} from './config/constants';
export {
  engineConfigSchema,
  parseEngineConfig,
} from './config/engine-config';
export type {
  EngineConfig,
  EngineConfigInput,
  ResolverConfig,
  RetryConfig,
} from './config/engine-config';
export { OcrBatchRunner } from './core/ocr-batch-runner';
export type {
  OcrBatchRunnerOptions,
  ProcessInputOptions,
  SubmitBatchOptions,
} from './core/ocr-batch-runner';
export {
  BackendHttpError,
  ConfigurationError,
  InvalidInputError,
  MalformedResponseError,
  ResolverError,
  UnsupportedFileTypeError,
} from './errors';
export { toBatchReport } from './report/batch-report';
export type { BatchReport, BatchReportItem } from './report/batch-report';
export {
  DocumentResolver,
  formatItemId,
} from './resolver/document-resolver';
export type {
  DocumentResolverOptions,
  InputDescriptor,
} from './resolver/document-resolver';
export { RetryPolicy } from './retry/retry-policy';
export type { RetryDecision } from './retry/retry-policy';
export {
  BatchScheduler,
  CANCELLED_MESSAGE,
} from './scheduler/batch-scheduler';
export type {
  BatchSchedulerOptions,
  ItemState,
  RunOptions,
} from './scheduler/batch-scheduler';
