/**
 * Base class for errors raised while turning input descriptors into WorkItems.
 *
 * These abort resolution before any batch starts: they point at a caller
 * mistake, not at a runtime fault of a single document.
 */
export abstract class ResolverError extends Error {
  abstract readonly kind: 'InvalidInput' | 'UnsupportedFileType';

  constructor(
    message: string,
    public readonly input: string,
  ) {
    super(message);
  }
}

/**
 * The descriptor does not name a usable file, directory or URL, or it
 * yields no processable documents.
 */
export class InvalidInputError extends ResolverError {
  public readonly name = 'InvalidInputError';
  public readonly kind = 'InvalidInput';
}

/**
 * A file whose extension the OCR backend does not accept.
 */
export class UnsupportedFileTypeError extends ResolverError {
  public readonly name = 'UnsupportedFileTypeError';
  public readonly kind = 'UnsupportedFileType';

  constructor(public readonly filePath: string) {
    super(`Unsupported file type: ${filePath}`, filePath);
  }
}
