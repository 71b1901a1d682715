// Configuration read from the environment
import { z } from 'zod';
import { LogLevel, parseLogLevel } from './logger';

export interface Env {
  LOG_LEVEL?: string; // 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'NONE'
  REQUEST_TIMEOUT?: string; // ms
  CORS_ALLOW_ORIGIN?: string; // '*' or a comma separated list of origins
  CIRCUIT_BREAKER_NAME?: string;
  CIRCUIT_BREAKER_MAX_REQUESTS?: string;
  CIRCUIT_BREAKER_INTERVAL?: string; // ms, 0 never resets the counts
  CIRCUIT_BREAKER_TIMEOUT?: string; // ms
}

export interface CircuitBreakerConfig {
  name: string;
  maxRequests: number;
  interval: number;
  timeout: number;
}

export interface GatewayConfig {
  logLevel: LogLevel;
  requestTimeout: number;
  corsAllowOrigin: string | string[];
  circuitBreaker: CircuitBreakerConfig;
}

const positiveMs = z.coerce.number().int().positive();

function parseOrigins(value: string): string | string[] {
  const origins = value.split(',').map(origin => origin.trim()).filter(Boolean);
  if (origins.length === 0) return '*';
  return origins.length === 1 ? origins[0] ?? '*' : origins;
}

const envSchema = z.object({
  LOG_LEVEL: z.string().optional().transform(parseLogLevel),
  REQUEST_TIMEOUT: positiveMs.default(120_000),
  CORS_ALLOW_ORIGIN: z.string().default('*').transform(parseOrigins),
  CIRCUIT_BREAKER_NAME: z.string().min(1).default('default'),
  CIRCUIT_BREAKER_MAX_REQUESTS: z.coerce.number().int().min(1).default(5),
  CIRCUIT_BREAKER_INTERVAL: z.coerce.number().int().min(0).default(60_000),
  CIRCUIT_BREAKER_TIMEOUT: positiveMs.default(60_000)
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// Parsed once, kept until flushConfig()
let configCache: GatewayConfig | null = null;

export function getConfig(env: Env = process.env): GatewayConfig {
  if (configCache) {
    return configCache;
  }

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }

  const values = parsed.data;
  configCache = {
    logLevel: values.LOG_LEVEL,
    requestTimeout: values.REQUEST_TIMEOUT,
    corsAllowOrigin: values.CORS_ALLOW_ORIGIN,
    circuitBreaker: {
      name: values.CIRCUIT_BREAKER_NAME,
      maxRequests: values.CIRCUIT_BREAKER_MAX_REQUESTS,
      interval: values.CIRCUIT_BREAKER_INTERVAL,
      timeout: values.CIRCUIT_BREAKER_TIMEOUT
    }
  };
  return configCache;
}

export function flushConfig(): void {
  configCache = null;
}
