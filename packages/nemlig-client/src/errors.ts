/**
 * Base error for all Nemlig client errors.
 */
export class NemligError extends Error {
  constructor(message: string, public readonly code?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NemligError';
  }
}

/**
 * Non-2xx HTTP response from the Nemlig API.
 * Carries the status and raw body for diagnostics.
 */
export class NemligHttpError extends NemligError {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly body: string,
    public readonly method: string,
    public readonly url: string
  ) {
    super(`${method} ${url} failed: ${status} ${statusText}`.trimEnd(), 'HTTP_ERROR');
    this.name = 'NemligHttpError';
  }
}

/**
 * Authentication-related errors.
 * Thrown when a handshake step fails or the login response lacks its success marker.
 */
export class NemligAuthError extends NemligError {
  constructor(message: string, code?: string, options?: { cause?: unknown }) {
    super(message, code, options);
    this.name = 'NemligAuthError';
  }
}

/**
 * Product-related errors.
 * Thrown when a product ID has no exact search match or its detail block is missing.
 */
export class NemligProductNotFoundError extends NemligError {
  constructor(message: string) {
    super(message, 'PRODUCT_NOT_FOUND');
    this.name = 'NemligProductNotFoundError';
  }
}

/**
 * Lookup errors for records outside the scanned window (e.g. an old order ID).
 */
export class NemligLookupError extends NemligError {
  constructor(message: string) {
    super(message, 'ORDER_NOT_FOUND');
    this.name = 'NemligLookupError';
  }
}
