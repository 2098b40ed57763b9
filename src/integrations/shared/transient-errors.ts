import axios from 'axios';
import { logger } from '../../config/logger.config';

/** Network error codes that indicate transient failures worth retrying */
const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EPIPE',
  'ENOTFOUND',
  'ENETUNREACH',
  'EAI_AGAIN',
]);

/**
 * Determines if an Axios error represents a transient failure that should be retried.
 * Returns true for 5xx server errors, timeouts, and network-level errors.
 * Returns false for 4xx client errors (permanent failures).
 */
export function isTransientError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) return false;

  // Network-level errors (no response received)
  if (error.code && TRANSIENT_NETWORK_CODES.has(error.code)) return true;

  // Axios timeout
  if (error.message.includes('timeout')) return true;

  // 5xx server errors are transient
  const status = error.response?.status;
  if (status !== undefined && status >= 500) return true;

  // 4xx and other responses are not transient
  return false;
}

export interface RetryOptions {
  /** Label used in logs (e.g. "Sleeper", "Yahoo") */
  apiName: string;
  context: string;
  maxRetries?: number;
  baseDelayMs?: number;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Execute a request with retry logic for transient failures.
 * Retries on 5xx errors, timeouts, and network errors with exponential backoff (1s, 2s, 4s).
 * Does NOT retry on 4xx client errors (permanent failures).
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const maxRetries = options.maxRetries ?? 3;
  const baseDelayMs = options.baseDelayMs ?? 1000;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxRetries || !isTransientError(error)) throw error;

      const delay = baseDelayMs * Math.pow(2, attempt);
      logger.warn(`${options.apiName} API transient error, retrying`, {
        context: options.context,
        attempt: attempt + 1,
        maxRetries,
        delay,
        errorMessage: errorMessage(error),
        errorCode: axios.isAxiosError(error) ? error.code : undefined,
        status: axios.isAxiosError(error) ? error.response?.status : undefined,
      });
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
