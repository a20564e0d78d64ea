export type NestingErrorCode = 'INVALID_GEOMETRY' | 'NO_VALID_FIT' | 'INVALID_CONFIG';

export class NestingError extends Error {
  constructor(
    readonly code: NestingErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Degenerate or malformed polygon input. Aborts the current solve.
 */
export class GeometryError extends NestingError {
  constructor(message: string) {
    super('INVALID_GEOMETRY', message);
  }
}

/**
 * No fit can be derived for a polygon pair, e.g. a part larger than the container.
 * The placement evaluator turns it into an unplaced part.
 */
export class NFPError extends NestingError {
  constructor(message: string) {
    super('NO_VALID_FIT', message);
  }
}

export class ConfigError extends NestingError {
  constructor(
    readonly field: string,
    message: string
  ) {
    super('INVALID_CONFIG', `${field}: ${message}`);
  }
}

export interface SerializedError {
  name: string;
  message: string;
  field?: string;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof ConfigError) {
    return { name: error.name, message: error.message, field: error.field };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'Error', message: String(error) };
}

/**
 * Rebuild a typed error from its structured-clone form (worker messages).
 */
export function deserializeError(serialized: SerializedError): Error {
  switch (serialized.name) {
    case 'NFPError':
      return new NFPError(serialized.message);
    case 'GeometryError':
      return new GeometryError(serialized.message);
    default: {
      const error = new Error(serialized.message);
      error.name = serialized.name;
      return error;
    }
  }
}
