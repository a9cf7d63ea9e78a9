import { AppError } from "./errors.js";
import type { Logger } from "./logger.js";

export type CircuitBreakerState = "closed" | "open" | "half-open";

export interface CircuitBreakerConfig {
  /** Name identifier for logging and metrics */
  name: string;

  /** Number of consecutive failures before opening the circuit. Default: 5 */
  failureThreshold?: number;

  /** Milliseconds to wait before transitioning from open to half-open. Default: 30000 */
  resetTimeout?: number;

  /** Milliseconds before a request is considered timed out. Default: 10000 */
  requestTimeout?: number;

  /** Number of successful requests in half-open state before closing. Default: 2 */
  successThreshold?: number;

  logger?: Logger;

  /** Decides whether an error counts toward opening the circuit */
  shouldRecordFailure?: (error: Error) => boolean;
}

export interface CircuitBreakerMetrics {
  state: CircuitBreakerState;
  consecutiveFailures: number;
  totalRequests: number;
  totalFailures: number;
  totalTimeouts: number;
  totalRejections: number;
  lastFailureTime: number | null;
}

/**
 * Thrown when the circuit is open and requests are rejected without being
 * attempted.
 */
export class CircuitBreakerError extends AppError {
  constructor(
    circuitName: string,
    options: {
      cause?: Error | undefined;
      context?: Record<string, unknown> | undefined;
    } = {},
  ) {
    super(`Circuit breaker '${circuitName}' is open`, {
      code: "CIRCUIT_BREAKER_OPEN",
      statusCode: 503,
      isOperational: true,
      cause: options.cause,
      context: { circuitName, ...options.context },
    });
  }
}

/**
 * Thrown when a guarded call does not settle within `requestTimeout`.
 */
export class RequestTimeoutError extends AppError {
  readonly timeoutMs: number;

  constructor(circuitName: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms for '${circuitName}'`, {
      code: "REQUEST_TIMEOUT",
      statusCode: 504,
      isOperational: true,
      context: { circuitName, timeoutMs },
    });
    this.timeoutMs = timeoutMs;
  }
}

async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  circuitName: string,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new RequestTimeoutError(circuitName, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Guards calls to an external collaborator.
 *
 * - CLOSED: calls pass through; consecutive failures are counted.
 * - OPEN: calls are rejected with `CircuitBreakerError` until `resetTimeout`
 *   elapses, then the circuit moves to HALF-OPEN.
 * - HALF-OPEN: `successThreshold` successes close the circuit, any failure
 *   reopens it.
 */
export class CircuitBreaker {
  private readonly name: string;
  private readonly failureThreshold: number;
  private readonly resetTimeout: number;
  private readonly requestTimeout: number;
  private readonly successThreshold: number;
  private readonly logger: Logger | undefined;
  private readonly shouldRecordFailure: (error: Error) => boolean;

  private state: CircuitBreakerState = "closed";
  private consecutiveFailures = 0;
  private consecutiveSuccesses = 0;
  private lastFailureTime: number | null = null;
  private nextAttemptTime: number | null = null;

  private totalRequests = 0;
  private totalFailures = 0;
  private totalTimeouts = 0;
  private totalRejections = 0;

  constructor(config: CircuitBreakerConfig) {
    this.name = config.name;
    this.failureThreshold = config.failureThreshold ?? 5;
    this.resetTimeout = config.resetTimeout ?? 30_000;
    this.requestTimeout = config.requestTimeout ?? 10_000;
    this.successThreshold = config.successThreshold ?? 2;
    this.logger = config.logger;
    this.shouldRecordFailure = config.shouldRecordFailure ?? (() => true);
  }

  /**
   * @throws {CircuitBreakerError} When the circuit is open
   * @throws {RequestTimeoutError} When `fn` outlives `requestTimeout`
   * @throws The underlying error if `fn` fails
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.totalRequests++;

    if (this.getState() === "open") {
      this.totalRejections++;
      throw new CircuitBreakerError(this.name);
    }

    try {
      const result = await withTimeout(fn(), this.requestTimeout, this.name);
      this.onSuccess();
      return result;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.onFailure(err);
      throw err;
    }
  }

  /**
   * Like `execute`, but resolves to `fallback(error)` instead of rejecting.
   */
  async executeWithFallback<T>(
    fn: () => Promise<T>,
    fallback: (error: Error) => T,
  ): Promise<T> {
    try {
      return await this.execute(fn);
    } catch (error) {
      return fallback(
        error instanceof Error ? error : new Error(String(error)),
      );
    }
  }

  getState(): CircuitBreakerState {
    if (
      this.state === "open" &&
      this.nextAttemptTime !== null &&
      Date.now() >= this.nextAttemptTime
    ) {
      this.transitionTo("half-open");
    }
    return this.state;
  }

  getMetrics(): CircuitBreakerMetrics {
    return {
      state: this.getState(),
      consecutiveFailures: this.consecutiveFailures,
      totalRequests: this.totalRequests,
      totalFailures: this.totalFailures,
      totalTimeouts: this.totalTimeouts,
      totalRejections: this.totalRejections,
      lastFailureTime: this.lastFailureTime,
    };
  }

  reset(): void {
    this.consecutiveFailures = 0;
    this.consecutiveSuccesses = 0;
    this.lastFailureTime = null;
    this.nextAttemptTime = null;
    this.transitionTo("closed");
  }

  private onSuccess(): void {
    this.consecutiveFailures = 0;

    if (this.state === "half-open") {
      this.consecutiveSuccesses++;
      if (this.consecutiveSuccesses >= this.successThreshold) {
        this.consecutiveSuccesses = 0;
        this.transitionTo("closed");
      }
    }
  }

  private onFailure(error: Error): void {
    if (error instanceof RequestTimeoutError) {
      this.totalTimeouts++;
    }

    if (!this.shouldRecordFailure(error)) {
      return;
    }

    this.totalFailures++;
    this.consecutiveFailures++;
    this.lastFailureTime = Date.now();
    this.consecutiveSuccesses = 0;

    if (
      this.state === "half-open" ||
      this.consecutiveFailures >= this.failureThreshold
    ) {
      this.nextAttemptTime = Date.now() + this.resetTimeout;
      this.transitionTo("open");
    }
  }

  private transitionTo(newState: CircuitBreakerState): void {
    if (this.state === newState) return;

    const oldState = this.state;
    this.state = newState;

    this.logger?.info(`Circuit breaker '${this.name}' state change`, {
      circuit: this.name,
      from: oldState,
      to: newState,
      consecutiveFailures: this.consecutiveFailures,
    });
  }
}
