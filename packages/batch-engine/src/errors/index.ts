export { BackendHttpError, MalformedResponseError } from './backend-errors';
export { ConfigurationError } from './configuration-error';
export {
  InvalidInputError,
  ResolverError,
  UnsupportedFileTypeError,
} from './resolver-error';
