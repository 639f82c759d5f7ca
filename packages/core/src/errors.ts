/**
 * Error codes raised by the mapper.
 */
export enum MapperErrorCode {
  NO_MODEL = 'no_model',
  INVALID_MODEL = 'invalid_model',
  NO_CLIENT = 'no_client',
  EMPTY_ID = 'empty_id',
  QUERY_REQUIRED = 'query_required',
  TRANSACTION_UNSUPPORTED = 'transaction_unsupported',
  EMPTY_UPDATE = 'empty_update',
  INVALID_BATCH_SIZE = 'invalid_batch_size',
  NOT_FOUND = 'not_found',
  FIELD_NOT_FOUND = 'field_not_found',
  DECODE_FAILED = 'decode_failed',
  VALUE_PROVIDER_FAILED = 'value_provider_failed',
  BATCH_COMMIT_FAILED = 'batch_commit_failed',
}

export interface MapperErrorOptions {
  /** Model (class) name the operation was bound to */
  model?: string;
  /** Field or tag the error refers to */
  field?: string;
  cause?: unknown;
}

export class MapperError extends Error {
  override name = 'MapperError';

  readonly code: MapperErrorCode;
  readonly model?: string;
  readonly field?: string;

  constructor(code: MapperErrorCode, message: string, options: MapperErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.code = code;
    this.model = options.model;
    this.field = options.field;
  }
}

export function isMapperError(error: unknown, code?: MapperErrorCode): error is MapperError {
  return error instanceof MapperError && (code === undefined || error.code === code);
}

/**
 * True when the error reports an absent document, as opposed to a broken call.
 */
export function isNotFoundError(error: unknown): boolean {
  return isMapperError(error, MapperErrorCode.NOT_FOUND);
}
