export class SDKError extends Error {
  override name: string;
  override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
  }
}

export class ConfigurationError extends SDKError {}

export class AbortError extends SDKError {}

export class RequestTimeoutError extends SDKError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.timeoutMs = timeoutMs;
  }
}
