export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'CONFIG_NOT_FOUND'
  | 'ENGINE_UNAVAILABLE'
  | 'ENGINE_STREAM_ERROR'
  | 'ENGINE_MODEL_NOT_FOUND'
  | 'INPUT_MISSING'
  | 'INPUT_INVALID'
  | 'INPUT_FILE_NOT_FOUND'
  | 'REGISTRY_ERROR'
  | 'UNKNOWN';

export class ChatmarkError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;
  readonly statusCode?: number;

  constructor(
    message: string,
    code: ErrorCode,
    options: { retryable?: boolean; statusCode?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'ChatmarkError';
    this.code = code;
    this.retryable = options.retryable ?? false;
    if (options.statusCode !== undefined) {
      this.statusCode = options.statusCode;
    }
  }

  static isChatmarkError(err: unknown): err is ChatmarkError {
    return err instanceof ChatmarkError;
  }

  static fromUnknown(err: unknown, fallbackCode: ErrorCode = 'UNKNOWN'): ChatmarkError {
    if (err instanceof ChatmarkError) return err;
    if (err instanceof Error) {
      return new ChatmarkError(err.message, fallbackCode, { cause: err });
    }
    return new ChatmarkError(String(err), fallbackCode);
  }
}
