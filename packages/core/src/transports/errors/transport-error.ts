export enum TransportErrorCode {
  CONNECTION_FAILED = 'connection_failed',
  REQUEST_TIMEOUT = 'request_timeout',
  INVALID_URL = 'invalid_url',
  UNKNOWN_ERROR = 'unknown_error',
}

/**
 * Raised when an HttpTransport cannot complete a request at all. HTTP error
 * statuses are not transport errors; they come back as responses.
 */
export class TransportError extends Error {
  public readonly code: TransportErrorCode;
  /** Whether sending the same request again could succeed */
  public readonly isRetryable: boolean;
  public readonly cause?: Error;

  public constructor(
    message: string,
    code: TransportErrorCode = TransportErrorCode.UNKNOWN_ERROR,
    isRetryable: boolean = false,
    cause?: Error,
  ) {
    super(message);
    this.name = 'TransportError';
    this.code = code;
    this.isRetryable = isRetryable;
    this.cause = cause;
    Object.setPrototypeOf(this, TransportError.prototype);
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      isRetryable: this.isRetryable,
      cause: this.cause?.message,
    };
  }

  public static connectionFailed(reason: string, cause?: Error): TransportError {
    return new TransportError(
      `Connection failed: ${reason}`,
      TransportErrorCode.CONNECTION_FAILED,
      true,
      cause,
    );
  }

  public static requestTimeout(timeoutMs: number, cause?: Error): TransportError {
    return new TransportError(
      `Request timeout after ${timeoutMs}ms`,
      TransportErrorCode.REQUEST_TIMEOUT,
      true,
      cause,
    );
  }

  /** Never retryable: the same URL fails the same way */
  public static invalidUrl(url: string, cause?: Error): TransportError {
    return new TransportError(`Invalid URL: ${url}`, TransportErrorCode.INVALID_URL, false, cause);
  }

  /**
   * Maps whatever `fetch` rejected with onto a TransportError.
   * Abort and timeout rejections become REQUEST_TIMEOUT.
   * @param error - Rejection value from fetch or from reading the body
   * @param timeoutMs - Timeout that was in force, for the message
   */
  public static fromFetchError(error: unknown, timeoutMs: number): TransportError {
    if (error instanceof TransportError) {
      return error;
    }

    const cause = error instanceof Error ? error : new Error(String(error));
    switch (cause.name) {
      case 'TimeoutError':
      case 'AbortError':
        return TransportError.requestTimeout(timeoutMs, cause);
      default:
        return TransportError.connectionFailed(cause.message, cause);
    }
  }
}
