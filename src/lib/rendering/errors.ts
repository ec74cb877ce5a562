/**
 * Crawl Error Handling
 * Error taxonomy shared by the renderer, the retry policy and the controller
 */

export enum CrawlErrorType {
  INVALID_URL = 'INVALID_URL',
  TIMEOUT = 'TIMEOUT',
  TIMEOUT_EXHAUSTED = 'TIMEOUT_EXHAUSTED',
  RENDER_ERROR = 'RENDER_ERROR',
  REPORTER_ERROR = 'REPORTER_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

export class CrawlError extends Error {
  readonly type: CrawlErrorType;

  constructor(type: CrawlErrorType, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.type = type;
  }
}

/**
 * A URL that cannot be parsed or is not http(s). The link is dropped.
 */
export class InvalidUrlError extends CrawlError {
  readonly input: string;

  constructor(input: string, reason: string) {
    super(CrawlErrorType.INVALID_URL, `Invalid URL "${input}": ${reason}`);
    this.input = input;
  }
}

/**
 * A single render attempt that did not finish in time. Retryable.
 */
export class RenderTimeoutError extends CrawlError {
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number, options?: { cause?: unknown }) {
    super(CrawlErrorType.TIMEOUT, `Timed out after ${timeoutMs}ms loading ${url}`, options);
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Structural failure (DNS, refused navigation, bad response). Never retried.
 */
export class RenderError extends CrawlError {
  readonly url: string;
  readonly reason: string;

  constructor(url: string, reason: string, options?: { cause?: unknown }) {
    super(CrawlErrorType.RENDER_ERROR, `Failed to render ${url}: ${reason}`, options);
    this.url = url;
    this.reason = reason;
  }
}

export class TimeoutExhaustedError extends CrawlError {
  readonly url: string;
  readonly attempts: number;

  constructor(url: string, attempts: number, options?: { cause?: unknown }) {
    super(
      CrawlErrorType.TIMEOUT_EXHAUSTED,
      `Page unreachable after ${attempts} attempt(s): ${url}`,
      options
    );
    this.url = url;
    this.attempts = attempts;
  }
}

/**
 * Log, screenshot or graph write failure. Reported on the fallback channel only.
 */
export class ReporterError extends CrawlError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(CrawlErrorType.REPORTER_ERROR, `Reporter failed during ${operation}: ${errorMessage(cause)}`, {
      cause,
    });
    this.operation = operation;
  }
}

export class ConfigurationError extends CrawlError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(CrawlErrorType.CONFIGURATION_ERROR, `Invalid crawl configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Map an arbitrary renderer failure onto the taxonomy.
 * Anything that is not recognisably a timeout is a structural render error.
 */
export function classifyError(error: unknown, url: string, timeoutMs: number): CrawlError {
  if (error instanceof CrawlError) {
    return error;
  }

  const message = errorMessage(error);
  const name = error instanceof Error ? error.name : '';

  if (
    name === 'TimeoutError' ||
    name === 'AbortError' ||
    /timeout|timed out|ETIMEDOUT|ESOCKETTIMEDOUT/i.test(message)
  ) {
    return new RenderTimeoutError(url, timeoutMs, { cause: error });
  }

  return new RenderError(url, message || 'Unknown error', { cause: error });
}

export function isTimeoutError(error: unknown): error is RenderTimeoutError {
  return error instanceof RenderTimeoutError;
}
