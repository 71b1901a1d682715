// Admin endpoints
import type { Handler } from 'hono';
import type { CircuitBreaker } from './circuitbreaker';

/**
 * Lists the stats of the given breakers, optionally narrowed by `?name=`.
 */
export function circuitBreakerStatusHandler(...breakers: CircuitBreaker[]): Handler {
  return (c) => {
    const name = c.req.query('name');
    const selected = name ? breakers.filter(breaker => breaker.name === name) : breakers;

    return c.json({
      success: true,
      circuitBreakers: selected.map(breaker => breaker.getStats())
    });
  };
}
