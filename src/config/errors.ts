export type ConfigLoadErrorCode = 'CONFIG_READ_ERROR' | 'CONFIG_PARSE_ERROR' | 'CONFIG_VALIDATION_ERROR';

/** A settings or layer file that could not be read, parsed or validated. */
export class ConfigLoadError extends Error {
  readonly code: ConfigLoadErrorCode;
  readonly path: string;

  constructor(code: ConfigLoadErrorCode, path: string, message: string, options?: { cause?: unknown }) {
    super(`${path}: ${message}`, options);
    this.name = 'ConfigLoadError';
    this.code = code;
    this.path = path;
  }
}
