import axios from 'axios';
import { errorMessage, ProviderError } from '../../utils/errorHandler';
import { logger } from '../../utils/logger';

// Transport failures worth another attempt; ECONNREFUSED usually means the
// provider is not running at all, so it is not in here.
const RETRYABLE_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ECONNRESET', 'EAI_AGAIN', 'EPIPE']);
const DETAIL_LIMIT = 300;

export interface RetryPolicy {
  maxRetries: number;
  delayMs: number;
}

export const NO_RETRY: RetryPolicy = { maxRetries: 0, delayMs: 0 };

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function describeBody(data: unknown): string {
  if (typeof data === 'string') return data.trim().slice(0, DETAIL_LIMIT);
  if (typeof data !== 'object' || data === null) return '';
  if ('error' in data) {
    const inner = data.error;
    if (typeof inner === 'string') return inner.slice(0, DETAIL_LIMIT);
    if (typeof inner === 'object' && inner !== null && 'message' in inner && typeof inner.message === 'string') {
      return inner.message.slice(0, DETAIL_LIMIT);
    }
  }
  if ('detail' in data && typeof data.detail === 'string') return data.detail.slice(0, DETAIL_LIMIT);
  if ('message' in data && typeof data.message === 'string') return data.message.slice(0, DETAIL_LIMIT);
  return '';
}

/**
 * Normalises anything a provider call can throw (axios errors, SDK errors,
 * plain exceptions) into a ProviderError.
 */
export function toProviderError(provider: string, err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;

  if (axios.isAxiosError(err)) {
    if (err.response) {
      const status = err.response.status;
      const detail = describeBody(err.response.data) || err.response.statusText || err.message;
      return new ProviderError(provider, `HTTP ${status}: ${detail}`, {
        retryable: isRetryableStatus(status),
        cause: err,
      });
    }
    if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
      return new ProviderError(provider, `request timed out (${err.message})`, { retryable: true, cause: err });
    }
    const code = err.code ?? '';
    return new ProviderError(provider, `connection failed: ${err.message || code}`, {
      retryable: RETRYABLE_CODES.has(code),
      cause: err,
    });
  }

  // SDK errors (e.g. @google/genai) carry the HTTP status on the error itself
  if (err instanceof Error && 'status' in err && typeof err.status === 'number') {
    return new ProviderError(provider, `HTTP ${err.status}: ${err.message}`, {
      retryable: isRetryableStatus(err.status),
      cause: err,
    });
  }

  return new ProviderError(provider, errorMessage(err), { cause: err });
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs a provider call, retrying retryable failures up to `policy.maxRetries`
 * times with exponential backoff. Always rejects with a ProviderError.
 */
export async function withRetry<T>(provider: string, call: () => Promise<T>, policy: RetryPolicy = NO_RETRY): Promise<T> {
  for (let attempt = 0; ; attempt += 1) {
    try {
      return await call();
    } catch (err) {
      const error = toProviderError(provider, err);
      if (!error.retryable || attempt >= policy.maxRetries) {
        throw error;
      }
      const waitMs = policy.delayMs * 2 ** attempt;
      logger.warn(
        { provider, attempt: attempt + 1, maxRetries: policy.maxRetries, waitMs, reason: error.message },
        '[Providers] Retrying provider call'
      );
      await sleep(waitMs);
    }
  }
}
