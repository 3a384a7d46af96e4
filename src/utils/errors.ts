/**
 * Error handling utilities for the MCP server
 * Per-subreddit failures are data, only topic resolution and deadlines escalate
 */

// ============================================================================
// Error Codes (MCP-compliant)
// ============================================================================

export const ErrorCode = {
  // Retryable errors
  RATE_LIMITED: 'RATE_LIMITED',
  TIMEOUT: 'TIMEOUT',
  NETWORK_ERROR: 'NETWORK_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',

  // Non-retryable errors
  AUTH_ERROR: 'AUTH_ERROR',
  FORBIDDEN: 'FORBIDDEN',
  INVALID_INPUT: 'INVALID_INPUT',
  NOT_FOUND: 'NOT_FOUND',
  UNKNOWN_TOPIC: 'UNKNOWN_TOPIC',

  // Internal errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  PARSE_ERROR: 'PARSE_ERROR',
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
} as const;

export type ErrorCodeType = typeof ErrorCode[keyof typeof ErrorCode];

// ============================================================================
// Structured Error Types
// ============================================================================

export interface StructuredError {
  code: ErrorCodeType;
  message: string;
  retryable: boolean;
  statusCode?: number;
  cause?: string;
}

export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
}

// ============================================================================
// Domain Errors
// ============================================================================

/**
 * Raised when a topic name is absent from the topic mapping.
 * Surfaced to the caller as-is, never retried.
 */
export class UnknownTopicError extends Error {
  readonly name = 'UnknownTopicError';

  constructor(
    readonly topic: string,
    readonly availableTopics: readonly string[]
  ) {
    super(`Topic '${topic}' not found`);
  }
}

/**
 * A deadline was exceeded, either for one subreddit or for a whole call
 */
export class TimeoutError extends Error {
  readonly name = 'TimeoutError';
}

/**
 * Non-2xx response from the Reddit API
 */
export class RedditApiError extends Error {
  readonly name = 'RedditApiError';

  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
  }
}

/**
 * Invalid topic mapping file
 */
export class TopicConfigError extends Error {
  readonly name = 'TopicConfigError';
}

// ============================================================================
// Error Classification
// ============================================================================

/**
 * Classify any error into a structured format
 * NEVER throws - always returns a valid StructuredError
 */
export function classifyError(error: unknown): StructuredError {
  if (error == null) {
    return {
      code: ErrorCode.UNKNOWN_ERROR,
      message: 'An unknown error occurred',
      retryable: false,
    };
  }

  if (error instanceof UnknownTopicError) {
    return { code: ErrorCode.UNKNOWN_TOPIC, message: error.message, retryable: false };
  }

  if (error instanceof TimeoutError) {
    return { code: ErrorCode.TIMEOUT, message: error.message, retryable: true };
  }

  if (error instanceof RedditApiError) {
    return classifyHttpError(error.status, error.message);
  }

  const err: {
    message?: unknown;
    status?: unknown;
    code?: unknown;
    name?: unknown;
    cause?: unknown;
  } = typeof error === 'object' ? error : {};

  const message = typeof err.message === 'string' && err.message ? err.message : String(error);
  const statusCode = typeof err.status === 'number' ? err.status : undefined;
  const errCode = typeof err.code === 'string' ? err.code : undefined;
  const errName = typeof err.name === 'string' ? err.name : undefined;

  // Network errors (Node.js specific, possibly wrapped by fetch as `cause`)
  const causeCode = readCauseCode(err.cause);
  const networkCode = [errCode, causeCode].find(
    (c) => c === 'ECONNREFUSED' || c === 'ENOTFOUND' || c === 'ECONNRESET' || c === 'EAI_AGAIN'
  );
  if (networkCode) {
    return {
      code: ErrorCode.NETWORK_ERROR,
      message: `Network error: ${networkCode}`,
      retryable: true,
      cause: message,
    };
  }

  // Timeout errors
  if (
    errCode === 'ECONNABORTED' ||
    errCode === 'ETIMEDOUT' ||
    errName === 'AbortError' ||
    errName === 'TimeoutError' ||
    message.toLowerCase().includes('timeout') ||
    message.toLowerCase().includes('timed out')
  ) {
    return {
      code: ErrorCode.TIMEOUT,
      message: 'Request timed out',
      retryable: true,
      cause: message,
    };
  }

  if (statusCode) {
    return classifyHttpError(statusCode, message);
  }

  if (errName === 'ZodError' || message.includes('JSON') || message.includes('Unexpected token')) {
    return {
      code: ErrorCode.PARSE_ERROR,
      message: 'Failed to parse response',
      retryable: false,
      cause: message.substring(0, 500),
    };
  }

  // fetch() rejects with a bare TypeError when the connection fails
  if (errName === 'TypeError' && message === 'fetch failed') {
    return {
      code: ErrorCode.NETWORK_ERROR,
      message: 'Network error',
      retryable: true,
      cause: message,
    };
  }

  return {
    code: ErrorCode.UNKNOWN_ERROR,
    message: message.substring(0, 500),
    retryable: false,
    cause: err.cause ? String(err.cause) : undefined,
  };
}

function readCauseCode(cause: unknown): string | undefined {
  if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}

/**
 * Classify HTTP status codes into structured errors
 */
export function classifyHttpError(status: number, message: string): StructuredError {
  if (status >= 300 && status < 400) {
    // Reddit redirects missing and banned subreddits to its search page
    return { code: ErrorCode.NOT_FOUND, message: 'Subreddit not found or banned', retryable: false, statusCode: status };
  }

  switch (status) {
    case 400:
      return { code: ErrorCode.INVALID_INPUT, message: 'Bad request', retryable: false, statusCode: status };
    case 401:
      return { code: ErrorCode.AUTH_ERROR, message: 'Invalid Reddit credentials', retryable: false, statusCode: status };
    case 403:
      return { code: ErrorCode.FORBIDDEN, message: 'Access forbidden (private or quarantined)', retryable: false, statusCode: status };
    case 404:
      return { code: ErrorCode.NOT_FOUND, message: 'Resource not found', retryable: false, statusCode: status };
    case 408:
      return { code: ErrorCode.TIMEOUT, message: 'Request timeout', retryable: true, statusCode: status };
    case 429:
      return { code: ErrorCode.RATE_LIMITED, message: 'Rate limit exceeded', retryable: true, statusCode: status };
    case 451:
      return { code: ErrorCode.FORBIDDEN, message: 'Unavailable for legal reasons', retryable: false, statusCode: status };
    case 500:
      return { code: ErrorCode.INTERNAL_ERROR, message: 'Server error', retryable: true, statusCode: status };
    case 502:
      return { code: ErrorCode.SERVICE_UNAVAILABLE, message: 'Bad gateway', retryable: true, statusCode: status };
    case 503:
      return { code: ErrorCode.SERVICE_UNAVAILABLE, message: 'Service unavailable', retryable: true, statusCode: status };
    case 504:
      return { code: ErrorCode.TIMEOUT, message: 'Gateway timeout', retryable: true, statusCode: status };
    default:
      if (status >= 500) {
        return { code: ErrorCode.SERVICE_UNAVAILABLE, message: `Server error: ${status}`, retryable: true, statusCode: status };
      }
      return { code: ErrorCode.UNKNOWN_ERROR, message: `HTTP ${status}: ${message}`, retryable: false, statusCode: status };
  }
}

// ============================================================================
// Backoff & Timeouts
// ============================================================================

/**
 * Calculate delay with exponential backoff and jitter
 */
export function calculateBackoff(attempt: number, options: BackoffOptions): number {
  const exponentialDelay = options.baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * 0.3 * exponentialDelay; // 0-30% jitter
  return Math.min(exponentialDelay + jitter, options.maxDelayMs);
}

function abortError(): Error {
  const error = new Error('Aborted');
  error.name = 'AbortError';
  return error;
}

/**
 * Sleep utility that respects abort signals
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timeout);
      reject(abortError());
    };

    const timeout = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Wrap a fetch call with timeout via AbortController
 */
export function fetchWithTimeout(
  url: string,
  options: RequestInit & { timeoutMs?: number } = {}
): Promise<Response> {
  const { timeoutMs = 30000, signal: externalSignal, ...fetchOptions } = options;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const onAbort = () => controller.abort();

  if (externalSignal) {
    if (externalSignal.aborted) controller.abort();
    else externalSignal.addEventListener('abort', onAbort, { once: true });
  }

  return fetch(url, { ...fetchOptions, signal: controller.signal }).finally(() => {
    clearTimeout(timeoutId);
    externalSignal?.removeEventListener('abort', onAbort);
  });
}

// ============================================================================
// Tool Responses
// ============================================================================

/**
 * Build an MCP error result from a structured error
 */
export function createToolErrorFromStructured(error: StructuredError): {
  content: Array<{ type: 'text'; text: string }>;
  isError: true;
} {
  const retryHint = error.retryable ? '\n\n💡 This error may be temporary. Try again in a moment.' : '';
  return {
    content: [{ type: 'text', text: `# ❌ Error\n\n**${error.code}:** ${error.message}${retryHint}` }],
    isError: true,
  };
}
