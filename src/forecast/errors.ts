/**
 * Forecast Module - Error Types
 *
 * Typed error union for forecast retrieval.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while fetching forecasts.
 */
export type ForecastError =
  | {
      readonly type: "REQUEST_FAILED";
      readonly message: string;
      readonly statusCode: number;
    }
  | {
      readonly type: "NETWORK_ERROR";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "TIMEOUT";
      readonly message: string;
    }
  | {
      readonly type: "INVALID_RESPONSE";
      readonly message: string;
      readonly responseData?: unknown;
    }
  | {
      readonly type: "NOT_CONFIGURED";
      readonly message: string;
    };

/**
 * Create a REQUEST_FAILED error.
 */
export function requestFailed(
  message: string,
  statusCode: number,
): ForecastError {
  return { type: "REQUEST_FAILED", message, statusCode };
}

/**
 * Create a NETWORK_ERROR.
 */
export function networkError(message: string, cause?: Error): ForecastError {
  if (cause) {
    return { type: "NETWORK_ERROR", message, cause };
  }
  return { type: "NETWORK_ERROR", message };
}

/**
 * Create a TIMEOUT error.
 */
export function timeout(message: string): ForecastError {
  return { type: "TIMEOUT", message };
}

/**
 * Create an INVALID_RESPONSE error.
 */
export function invalidResponse(
  message: string,
  responseData?: unknown,
): ForecastError {
  return { type: "INVALID_RESPONSE", message, responseData };
}

/**
 * Create a NOT_CONFIGURED error.
 */
export function notConfigured(message: string): ForecastError {
  return { type: "NOT_CONFIGURED", message };
}

/**
 * Format a ForecastError for logging.
 */
export function formatForecastError(error: ForecastError): string {
  switch (error.type) {
    case "REQUEST_FAILED":
      return `Request failed (${error.statusCode}): ${error.message}`;
    case "NETWORK_ERROR":
      return `Network error: ${error.message}`;
    case "TIMEOUT":
      return `Timeout: ${error.message}`;
    case "INVALID_RESPONSE":
      return `Invalid response: ${error.message}`;
    case "NOT_CONFIGURED":
      return `Not configured: ${error.message}`;
  }
}
