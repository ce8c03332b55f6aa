export {
  EXIT_ERROR,
  EXIT_OK,
  EXIT_PARTIAL_FAILURE,
  runProcessCommand,
} from './commands/process-command';
export type { ProcessCommandDeps } from './commands/process-command';
export { USAGE, UsageError, parseCommand } from './commands/parse-args';
export type { Command, ProcessArgs, ServeArgs } from './commands/parse-args';
export { runServeCommand } from './commands/serve-command';
export type { ServeCommandDeps } from './commands/serve-command';
export {
  createMistralBackend,
  toEngineConfig,
} from './config/engine-settings';
export type { BackendFactory, EngineOverrides } from './config/engine-settings';
export { envSchema, loadEnv } from './config/env';
export type { AppEnv } from './config/env';
export { main } from './main';
export type { MainDeps } from './main';
export { writeReport } from './output/write-report';
export { OcrServer } from './server/ocr-server';
export type { OcrServerOptions } from './server/ocr-server';
export { VERSION } from './version';
