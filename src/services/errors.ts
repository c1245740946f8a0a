/**
 * Gateway error taxonomy
 *
 * Each error carries the HTTP status and the sanitized message returned to
 * callers. The constructor message holds internal diagnostics and is only
 * ever logged.
 */

import type { ErrorResponse } from '../types/chat.js';

export type GatewayErrorCode =
  | 'backend_error'
  | 'transform_error'
  | 'timeout_error';

/**
 * Base class for failures raised while serving a chat completion
 */
export abstract class GatewayError extends Error {
  abstract readonly code: GatewayErrorCode;
  abstract readonly statusCode: number;
  abstract readonly publicMessage: string;

  toResponse(): ErrorResponse {
    return createErrorResponse(this.publicMessage, this.code, this.code);
  }
}

/**
 * The outbound call failed, the backend answered with a non-success status,
 * or its body was not valid JSON
 */
export class BackendError extends GatewayError {
  readonly code = 'backend_error';
  readonly statusCode = 502;
  readonly publicMessage = 'The backend service request failed';

  constructor(
    message: string,
    public readonly backendStatus?: number
  ) {
    super(message);
    this.name = 'BackendError';
  }
}

/**
 * The backend body parsed but lacked the fields the active provider requires
 */
export class TransformError extends GatewayError {
  readonly code = 'transform_error';
  readonly statusCode = 500;
  readonly publicMessage = 'Failed to process the backend response';

  constructor(message: string) {
    super(message);
    this.name = 'TransformError';
  }
}

export class TimeoutError extends GatewayError {
  readonly code = 'timeout_error';
  readonly statusCode = 504;
  readonly publicMessage = 'The backend service did not respond in time';

  constructor(public readonly timeoutMs: number) {
    super(`Backend call exceeded ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Invalid or missing startup configuration. Fatal: the gateway never binds.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Create an error response body
 */
export function createErrorResponse(
  message: string,
  type: string,
  code: string,
  param?: string
): ErrorResponse {
  return {
    error: {
      message,
      type,
      code,
      ...(param && { param }),
    },
  };
}

/**
 * Render any value for a log line without throwing
 */
export function describePayload(payload: unknown): string {
  try {
    return JSON.stringify(payload) ?? String(payload);
  } catch {
    return String(payload);
  }
}
