/**
 * Circuit Breaker for Ollama provider calls
 *
 * Opens after `failureThreshold` consecutive server-side failures and
 * rejects calls until `recoveryTimeMs` has passed; then lets calls through
 * in HALF_OPEN until `halfOpenSuccessThreshold` succeed.
 *
 * Only server-side errors (HTTP 429/5xx, network errors) count. Client-side
 * errors (bad request, unknown model, malformed response) do not.
 *
 * @module services/ollama/circuit-breaker
 */

import { ProviderError } from '../providers/types.js';

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

const SERVER_STATUS = new Set([429, 500, 502, 503, 504]);
const NETWORK_ERROR = /ECONNRESET|ETIMEDOUT|ENOTFOUND|ECONNREFUSED|socket hang up|fetch failed|aborted/i;

function errorCode(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'code' in value) {
    const code = value.code;
    return typeof code === 'string' ? code : '';
  }
  return '';
}

/**
 * Whether an error is a transient server-side failure.
 */
export function isServerError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  if (error instanceof ProviderError && error.statusCode !== undefined) {
    return SERVER_STATUS.has(error.statusCode);
  }

  const cause = error.cause;
  const causeMsg = cause instanceof Error ? cause.message : '';
  const combined = `${error.name} ${error.message} ${causeMsg} ${errorCode(cause)}`;

  if (/\b(429|500|502|503|504)\b/.test(combined)) return true;
  if (NETWORK_ERROR.test(combined)) return true;
  return /service.?unavailable|internal.?server|model.*load/i.test(combined);
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeMs: number;
  halfOpenSuccessThreshold: number;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeMs: 60000,
  halfOpenSuccessThreshold: 2,
};

export interface CircuitBreakerStatus {
  state: CircuitState;
  failureCount: number;
  lastFailureTime: number | null;
  timeToRecovery: number | null;
}

/**
 * Error thrown when the circuit is open
 */
export class CircuitBreakerOpenError extends Error {
  readonly timeToRecovery: number;

  constructor(message: string, timeToRecovery: number) {
    super(message);
    this.name = 'CircuitBreakerOpenError';
    this.timeToRecovery = timeToRecovery;
  }
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private readonly config: CircuitBreakerConfig;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.checkRecovery();

    if (this.state === CircuitState.OPEN) {
      const timeToRecovery = this.getTimeToRecovery();
      throw new CircuitBreakerOpenError(
        `Circuit breaker is OPEN. Try again in ${Math.ceil(timeToRecovery / 1000)}s`,
        timeToRecovery
      );
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      if (isServerError(error)) {
        this.recordFailure();
      } else {
        console.error(
          `[CircuitBreaker] Client-side error (not counted): ${error instanceof Error ? error.message : String(error)}`
        );
      }
      throw error;
    }
  }

  private checkRecovery(): void {
    if (this.state === CircuitState.OPEN && this.lastFailureTime !== null) {
      if (Date.now() - this.lastFailureTime >= this.config.recoveryTimeMs) {
        console.error('[CircuitBreaker] Transitioning from OPEN to HALF_OPEN');
        this.state = CircuitState.HALF_OPEN;
        this.successCount = 0;
      }
    }
  }

  private recordSuccess(): void {
    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.config.halfOpenSuccessThreshold) {
        console.error('[CircuitBreaker] Recovery confirmed, transitioning to CLOSED');
        this.state = CircuitState.CLOSED;
        this.failureCount = 0;
        this.successCount = 0;
        this.lastFailureTime = null;
      }
    } else {
      this.failureCount = 0;
    }
  }

  private recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = Date.now();
    console.error(
      `[CircuitBreaker] Failure recorded (${this.failureCount}/${this.config.failureThreshold})`
    );

    if (this.state === CircuitState.HALF_OPEN || this.failureCount >= this.config.failureThreshold) {
      console.error('[CircuitBreaker] Transitioning to OPEN');
      this.state = CircuitState.OPEN;
      this.successCount = 0;
    }
  }

  private getTimeToRecovery(): number {
    if (this.lastFailureTime === null) return 0;
    return Math.max(0, this.config.recoveryTimeMs - (Date.now() - this.lastFailureTime));
  }

  getStatus(): CircuitBreakerStatus {
    this.checkRecovery();
    return {
      state: this.state,
      failureCount: this.failureCount,
      lastFailureTime: this.lastFailureTime,
      timeToRecovery: this.state === CircuitState.OPEN ? this.getTimeToRecovery() : null,
    };
  }

  getState(): CircuitState {
    this.checkRecovery();
    return this.state;
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
    console.error('[CircuitBreaker] Manually reset to CLOSED');
  }
}
