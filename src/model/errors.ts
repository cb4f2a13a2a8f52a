export type ModuloErrorKind = 'parse' | 'encoding' | 'generation_limit' | 'config';

/** Base class for errors thrown by the library; "no solution" is a result, never an error */
export class ModuloError extends Error {
  constructor(
    public readonly kind: ModuloErrorKind,
    message: string
  ) {
    super(message);
    this.name = 'ModuloError';
  }
}

/** Malformed level or attempt text, or a structurally invalid level. */
export class LevelParseError extends ModuloError {
  constructor(message: string) {
    super('parse', message);
    this.name = 'LevelParseError';
  }
}

/** A move offset that cannot be written as two hex digits. */
export class EncodingError extends ModuloError {
  constructor(message: string) {
    super('encoding', message);
    this.name = 'EncodingError';
  }
}

/** The generated board cannot be represented in the offset encoding. */
export class GenerationLimitError extends ModuloError {
  constructor(message: string) {
    super('generation_limit', message);
    this.name = 'GenerationLimitError';
  }
}

export class ConfigError extends ModuloError {
  constructor(message: string) {
    super('config', message);
    this.name = 'ConfigError';
  }
}
