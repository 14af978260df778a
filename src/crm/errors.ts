// ============================================================================
// CRM Error Types — Typed errors for Bitrix24 REST call failures
// ============================================================================

/**
 * Base error for all CRM API errors.
 *
 * `retryable` separates transient failures (network, timeout, 5xx, rate
 * limits), which the queue should redeliver, from permanent ones (4xx), which
 * retrying cannot fix. NEVER includes the access token in messages.
 */
export class CrmApiError extends Error {
  readonly statusCode: number;
  readonly errorCode: string | undefined;
  readonly responseBody: string;
  readonly retryable: boolean;

  constructor(
    message: string,
    statusCode: number,
    responseBody: string,
    options: { errorCode?: string; retryable?: boolean } = {},
  ) {
    super(message);
    this.name = 'CrmApiError';
    this.statusCode = statusCode;
    this.responseBody = responseBody;
    this.errorCode = options.errorCode;
    this.retryable = options.retryable ?? false;
  }
}

/**
 * Thrown when an item or contact does not exist (HTTP 404 or NOT_FOUND).
 * Permanent: a missing record is not going to appear on retry.
 */
export class CrmNotFoundError extends CrmApiError {
  constructor(method: string, responseBody: string, statusCode = 404) {
    super(`CRM record not found (${method})`, statusCode, responseBody, { errorCode: 'NOT_FOUND' });
    this.name = 'CrmNotFoundError';
  }
}

/**
 * Thrown on HTTP 401 or an expired/invalid token.
 * Retryable: the maintenance worker refreshes the token out-of-band, so a
 * later attempt usually succeeds.
 */
export class CrmAuthError extends CrmApiError {
  constructor(responseBody: string, errorCode?: string) {
    super(
      'CRM API authentication failed (401). Check that the token refresh job is running.',
      401,
      responseBody,
      { errorCode, retryable: true },
    );
    this.name = 'CrmAuthError';
  }
}

/**
 * Thrown on HTTP 429 or QUERY_LIMIT_EXCEEDED.
 * Retryable: the queue redelivers with exponential backoff.
 */
export class CrmRateLimitError extends CrmApiError {
  constructor(responseBody: string) {
    super('CRM API rate limit exceeded. Retry after backoff.', 429, responseBody, {
      errorCode: 'QUERY_LIMIT_EXCEEDED',
      retryable: true,
    });
    this.name = 'CrmRateLimitError';
  }
}

/**
 * Thrown on HTTP 5xx, network failures and timeouts.
 * statusCode is 0 when no response was received.
 */
export class CrmTransientError extends CrmApiError {
  constructor(message: string, statusCode: number, responseBody = '') {
    super(message, statusCode, responseBody, { retryable: true });
    this.name = 'CrmTransientError';
  }
}
