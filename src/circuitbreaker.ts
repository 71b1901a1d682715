// Circuit Breaker Pattern Implementation
import { z } from 'zod';
import {
  CircuitState,
  CircuitBreakerSettings,
  CircuitBreakerStats,
  Counts,
  ReadyToTrip
} from './types/circuitbreaker';
import { errorMessage, rootLogger } from './logger';

const DEFAULT_MIN_REQUESTS = 5;
const DEFAULT_FAILURE_RATIO = 0.6;

/**
 * Trips once at least five requests were seen in the window and 60% or more
 * of them failed.
 */
export const defaultReadyToTrip: ReadyToTrip = (counts) => {
  if (counts.requests < DEFAULT_MIN_REQUESTS) {
    return false;
  }
  return counts.totalFailures / counts.requests >= DEFAULT_FAILURE_RATIO;
};

export function defaultCircuitBreakerSettings(): CircuitBreakerSettings {
  return {
    name: 'default',
    maxRequests: 5,
    interval: 60_000,
    timeout: 60_000,
    readyToTrip: defaultReadyToTrip,
    isSuccessful: () => false
  };
}

const settingsSchema = z.object({
  name: z.string().min(1),
  maxRequests: z.number().int().min(1),
  interval: z.number().int().min(0),
  timeout: z.number().int().positive(),
  readyToTrip: z.function(),
  isSuccessful: z.function(),
  onStateChange: z.function().optional()
});

export class CircuitBreakerConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CircuitBreakerConfigError';
  }
}

/**
 * Raised instead of running the operation while the breaker is OPEN, or
 * HALF_OPEN with its probe budget used up.
 */
export class CircuitOpenError extends Error {
  constructor(
    readonly breakerName: string,
    readonly state: CircuitState.OPEN | CircuitState.HALF_OPEN,
    readonly retryAfterMs?: number
  ) {
    super(
      state === CircuitState.OPEN
        ? `circuit breaker "${breakerName}" is open`
        : `circuit breaker "${breakerName}" is half-open with no probe capacity left`
    );
    this.name = 'CircuitOpenError';
  }
}

export function isCircuitOpenError(value: unknown): value is CircuitOpenError {
  return value instanceof CircuitOpenError;
}

export interface ExecuteOptions<T> {
  /** Counts a returned value as a failure without altering what the caller receives. */
  isFailureResult?: (value: T) => boolean;
}

function emptyCounts(): Counts {
  return {
    requests: 0,
    totalSuccesses: 0,
    totalFailures: 0,
    consecutiveSuccesses: 0,
    consecutiveFailures: 0
  };
}

export class CircuitBreaker {
  readonly settings: Readonly<CircuitBreakerSettings>;

  private state: CircuitState = CircuitState.CLOSED;
  private generation = 0;
  private counts: Counts = emptyCounts();
  private expiry = 0;

  constructor(settings: Partial<CircuitBreakerSettings> = {}) {
    const merged: CircuitBreakerSettings = { ...defaultCircuitBreakerSettings(), ...settings };
    const parsed = settingsSchema.safeParse(merged);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new CircuitBreakerConfigError(`Invalid circuit breaker settings: ${issues.join('; ')}`);
    }
    this.settings = Object.freeze(merged);
    this.toNewGeneration(Date.now());
  }

  get name(): string {
    return this.settings.name;
  }

  /**
   * Runs the operation if the breaker admits it and records the outcome.
   * The operation's value or error is handed back untouched.
   */
  async execute<T>(operation: () => T | Promise<T>, options: ExecuteOptions<T> = {}): Promise<T> {
    const generation = this.beforeRequest();

    let value: T;
    try {
      value = await operation();
    } catch (error) {
      this.recordOutcome(generation, () => this.settings.isSuccessful(error));
      throw error;
    }

    this.recordOutcome(generation, () => !(options.isFailureResult?.(value) ?? false));
    return value;
  }

  /**
   * Last observed state. Time based transitions are only applied by
   * `execute`, so an idle breaker may report a stale state.
   */
  getState(): CircuitState {
    return this.state;
  }

  getCounts(): Counts {
    return { ...this.counts };
  }

  getStats(): CircuitBreakerStats {
    return {
      name: this.name,
      state: this.state,
      generation: this.generation,
      counts: this.getCounts(),
      nextAttempt: this.state === CircuitState.OPEN
        ? new Date(this.expiry).toISOString()
        : null
    };
  }

  private beforeRequest(): number {
    const now = Date.now();
    const state = this.currentState(now);

    if (state === CircuitState.OPEN) {
      throw new CircuitOpenError(this.name, state, Math.max(0, this.expiry - now));
    }
    if (state === CircuitState.HALF_OPEN && this.counts.requests >= this.settings.maxRequests) {
      throw new CircuitOpenError(this.name, state);
    }

    this.counts.requests++;
    return this.generation;
  }

  /**
   * A classifier that throws still settles the admitted request, as a failure.
   */
  private recordOutcome(before: number, classify: () => boolean): void {
    let success: boolean;
    try {
      success = classify();
    } catch (error) {
      this.afterRequest(before, false);
      throw error;
    }
    this.afterRequest(before, success);
  }

  private afterRequest(before: number, success: boolean): void {
    const now = Date.now();
    const state = this.currentState(now);
    if (this.generation !== before) {
      return;
    }

    if (success) {
      this.onSuccess(state, now);
    } else {
      this.onFailure(state, now);
    }
  }

  private onSuccess(state: CircuitState, now: number): void {
    this.counts.totalSuccesses++;
    this.counts.consecutiveSuccesses++;
    this.counts.consecutiveFailures = 0;

    if (state === CircuitState.HALF_OPEN && this.counts.consecutiveSuccesses >= this.settings.maxRequests) {
      this.transitionTo(CircuitState.CLOSED, now);
    }
  }

  private onFailure(state: CircuitState, now: number): void {
    this.counts.totalFailures++;
    this.counts.consecutiveFailures++;
    this.counts.consecutiveSuccesses = 0;

    switch (state) {
      case CircuitState.CLOSED:
        if (this.settings.readyToTrip(this.counts)) {
          this.transitionTo(CircuitState.OPEN, now);
        }
        break;

      case CircuitState.HALF_OPEN:
        // Any failed probe reopens the circuit
        this.transitionTo(CircuitState.OPEN, now);
        break;
    }
  }

  /**
   * Applies the lazy, time driven transitions and returns the resulting state.
   */
  private currentState(now: number): CircuitState {
    switch (this.state) {
      case CircuitState.CLOSED:
        if (this.expiry > 0 && this.expiry <= now) {
          this.toNewGeneration(now);
        }
        break;

      case CircuitState.OPEN:
        if (this.expiry <= now) {
          this.transitionTo(CircuitState.HALF_OPEN, now);
        }
        break;
    }
    return this.state;
  }

  private transitionTo(newState: CircuitState, now: number): void {
    if (this.state === newState) {
      return;
    }

    const previous = this.state;
    this.state = newState;
    this.toNewGeneration(now);

    rootLogger.info('circuit breaker state changed', {
      breaker: this.name,
      from: previous,
      to: newState
    });
    try {
      this.settings.onStateChange?.(this.name, previous, newState);
    } catch (error) {
      rootLogger.error('circuit breaker state listener failed', {
        breaker: this.name,
        error: errorMessage(error)
      });
    }
  }

  private toNewGeneration(now: number): void {
    this.generation++;
    this.counts = emptyCounts();

    switch (this.state) {
      case CircuitState.CLOSED:
        this.expiry = this.settings.interval === 0 ? 0 : now + this.settings.interval;
        break;
      case CircuitState.OPEN:
        this.expiry = now + this.settings.timeout;
        break;
      case CircuitState.HALF_OPEN:
        this.expiry = 0;
        break;
    }
  }
}
