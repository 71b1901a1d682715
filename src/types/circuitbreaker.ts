// Circuit Breaker types and interfaces

export enum CircuitState {
  CLOSED = 'CLOSED',      // Normal operation, requests pass through
  OPEN = 'OPEN',          // Circuit is open, requests fail fast
  HALF_OPEN = 'HALF_OPEN' // Probing whether the downstream has recovered
}

/**
 * Outcome tally for the current generation of a breaker.
 */
export interface Counts {
  requests: number;
  totalSuccesses: number;
  totalFailures: number;
  consecutiveSuccesses: number;
  consecutiveFailures: number;
}

export type ReadyToTrip = (counts: Readonly<Counts>) => boolean;

export type StateChangeListener = (name: string, from: CircuitState, to: CircuitState) => void;

export interface CircuitBreakerSettings {
  name: string;
  maxRequests: number; // Probe budget in HALF_OPEN, also the successes needed to close (default: 5)
  interval: number; // CLOSED counting window in ms, 0 never resets (default: 60000)
  timeout: number; // Time in ms an OPEN breaker waits before probing (default: 60000)
  readyToTrip: ReadyToTrip;
  isSuccessful: (error: unknown) => boolean;
  onStateChange?: StateChangeListener;
}

export interface CircuitBreakerStats {
  name: string;
  state: CircuitState;
  generation: number;
  counts: Counts;
  nextAttempt: string | null;
}
