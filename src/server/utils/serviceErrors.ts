/**
 * Failures reported by reasoning-service adapters.
 *
 * These are raw shapes; ReasoningClient turns whatever survives the retries
 * into exactly one AppError subclass.
 */

abstract class ServiceError extends Error {
  constructor(
    public readonly serviceName: string,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Credentials or settings are missing; never retried
 */
export class ServiceConfigurationError extends ServiceError {
  constructor(
    serviceName: string,
    public readonly missingConfig: string[]
  ) {
    super(serviceName, `${serviceName} not configured. Missing: ${missingConfig.join(', ')}`);
  }
}

/**
 * Transport or HTTP failure. `statusCode` is undefined when no response arrived.
 */
export class ServiceConnectionError extends ServiceError {
  constructor(
    serviceName: string,
    public readonly statusCode: number | undefined,
    detail: string
  ) {
    super(serviceName, `${serviceName} connection failed${statusCode ? ` (HTTP ${statusCode})` : ''}: ${detail}`);
  }
}

export class ServiceRateLimitError extends ServiceError {
  public readonly statusCode = 429;

  constructor(
    serviceName: string,
    public readonly retryAfterSeconds?: number
  ) {
    super(serviceName, `${serviceName} is throttling requests${retryAfterSeconds ? `; retry after ${retryAfterSeconds}s` : ''}`);
  }
}
