/**
 * Scraping Error Handling
 * Classification of fetch and parse faults
 */

export enum ScrapingErrorType {
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  RATE_LIMITED = 'RATE_LIMITED',
  NOT_FOUND = 'NOT_FOUND',
  SERVER_ERROR = 'SERVER_ERROR',
  HTTP_ERROR = 'HTTP_ERROR',
  PARSE_ERROR = 'PARSE_ERROR',
  UNKNOWN = 'UNKNOWN',
}

export interface ScrapingError {
  type: ScrapingErrorType;
  message: string;
  statusCode?: number;
}

function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

function nameOf(error: unknown): string {
  return error instanceof Error ? error.name : '';
}

/**
 * Classify a thrown fault or an HTTP status
 */
export function classifyError(error: unknown, statusCode?: number): ScrapingError {
  const message = error === undefined ? '' : messageOf(error);
  const name = nameOf(error);

  // AbortController fires AbortError; AbortSignal.timeout fires TimeoutError
  if (
    name === 'AbortError' ||
    name === 'TimeoutError' ||
    message.includes('timeout') ||
    message.includes('ETIMEDOUT')
  ) {
    return {
      type: ScrapingErrorType.TIMEOUT,
      message: 'Request timed out',
      statusCode,
    };
  }

  if (
    message.includes('ECONNREFUSED') ||
    message.includes('ECONNRESET') ||
    message.includes('ENOTFOUND') ||
    message.includes('EAI_AGAIN') ||
    message.includes('fetch failed')
  ) {
    return {
      type: ScrapingErrorType.NETWORK_ERROR,
      message: 'Network connection failed',
      statusCode,
    };
  }

  if (statusCode !== undefined) {
    if (statusCode === 429) {
      return {
        type: ScrapingErrorType.RATE_LIMITED,
        message: 'Rate limited by server',
        statusCode,
      };
    }

    if (statusCode === 404) {
      return {
        type: ScrapingErrorType.NOT_FOUND,
        message: 'Page not found',
        statusCode,
      };
    }

    if (statusCode >= 500) {
      return {
        type: ScrapingErrorType.SERVER_ERROR,
        message: 'Server error',
        statusCode,
      };
    }

    return {
      type: ScrapingErrorType.HTTP_ERROR,
      message: `Unexpected status ${statusCode}`,
      statusCode,
    };
  }

  return {
    type: ScrapingErrorType.UNKNOWN,
    message: message || 'Unknown error',
  };
}

/**
 * Structural parse fault: an expected markup anchor is missing
 */
export function parseError(message: string): ScrapingError {
  return {
    type: ScrapingErrorType.PARSE_ERROR,
    message,
  };
}
