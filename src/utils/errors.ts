// ============================================================================
// Error Types
// ============================================================================

/**
 * Raised before any call is placed when the campaign cannot run at all
 * (missing credentials, invalid run configuration)
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Any non-2xx, network or timeout failure talking to the voice gateway
 */
export class GatewayError extends Error {
  readonly httpStatus: number | undefined;

  constructor(message: string, httpStatus?: number) {
    super(message);
    this.name = "GatewayError";
    this.httpStatus = httpStatus;
  }
}

/** HTTP 429 */
export class RateLimitedError extends GatewayError {
  constructor(message: string) {
    super(message, 429);
    this.name = "RateLimitedError";
  }
}

/** HTTP 401 / 403 */
export class AuthError extends GatewayError {
  constructor(message: string, httpStatus = 401) {
    super(message, httpStatus);
    this.name = "AuthError";
  }
}

/** Call record not available yet (HTTP 404) */
export class NotFoundError extends GatewayError {
  constructor(message: string) {
    super(message, 404);
    this.name = "NotFoundError";
  }
}

/**
 * The call was placed but its transcript never became available
 */
export class TranscriptFetchError extends Error {
  readonly callId: string;

  constructor(callId: string, message: string) {
    super(message);
    this.name = "TranscriptFetchError";
    this.callId = callId;
  }
}

/**
 * A client or campaign id that does not exist
 */
export class EntityNotFoundError extends Error {
  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`);
    this.name = "EntityNotFoundError";
  }
}

/**
 * Start of a running campaign, stop of an idle one
 */
export class CampaignStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CampaignStateError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}
