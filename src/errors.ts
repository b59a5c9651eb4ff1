export enum ErrorCode {
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

export class ContentMemoryError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ContentMemoryError';
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export function isContentMemoryError(err: unknown): err is ContentMemoryError {
  return err instanceof ContentMemoryError;
}
