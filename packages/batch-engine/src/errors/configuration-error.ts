/**
 * Missing or invalid settings (API keys, numeric limits, environment variables).
 */
export class ConfigurationError extends Error {
  public readonly name = 'ConfigurationError';

  constructor(
    message: string,
    public readonly details: string[] = [],
  ) {
    super(
      details.length > 0
        ? `${message}:\n${details.map((detail) => `  - ${detail}`).join('\n')}`
        : message,
    );
  }
}
