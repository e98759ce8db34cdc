import { withRetry } from '@/utils/retry.ts';
import { createLogger } from '@/utils/logger.ts';
import {
  CancellationError,
  ExternalServiceError,
  isTradePlanError,
} from '@/plan/errors.ts';
import type { RetryPolicy } from '@/utils/retry.ts';
import type { CapabilityName, TradePlanError } from '@/plan/errors.ts';
import type { StageName } from '@/plan/types.ts';

const logger = createLogger('boundary');

const classifyCapabilityError = (
  capability: CapabilityName,
  err: unknown,
  signal?: AbortSignal,
): TradePlanError => {
  if (isTradePlanError(err)) return err;
  if (signal?.aborted) {
    return new CancellationError(`${capability} call aborted`, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new ExternalServiceError(capability, `${capability} call failed: ${message}`, { cause: err });
};

export type BoundaryOptions = {
  stage: StageName;
  retry: RetryPolicy;
  signal?: AbortSignal;
};

/**
 * Calls a capability from inside a stage. Failures are classified into the
 * typed categories, retryable ExternalServiceErrors are retried with backoff,
 * and an exhausted ExternalServiceError is rethrown tagged with the stage.
 */
export const callCapability = async <T>(
  capability: CapabilityName,
  call: (signal?: AbortSignal) => Promise<T>,
  options: BoundaryOptions,
): Promise<T> => {
  let attempts = 0;

  try {
    return await withRetry(
      async (attempt) => {
        attempts = attempt;
        try {
          return await call(options.signal);
        } catch (err) {
          throw classifyCapabilityError(capability, err, options.signal);
        }
      },
      {
        ...options.retry,
        signal: options.signal,
        shouldRetry: (err) => err instanceof ExternalServiceError && err.retryable,
        onRetry: (err, attempt, delayMs) => {
          logger.warn(`${options.stage}/${capability} attempt ${attempt} failed, retrying in ${delayMs}ms`, {
            error: err instanceof Error ? err.message : String(err),
          });
        },
      },
    );
  } catch (err) {
    if (options.signal?.aborted && !(err instanceof CancellationError)) {
      throw new CancellationError(`${capability} call aborted`, { cause: err });
    }
    if (err instanceof ExternalServiceError) {
      logger.error(`${options.stage}/${capability} gave up after ${attempts} attempt(s)`, {
        error: err.message,
        status: err.status,
      });
      throw err.tagged(options.stage, attempts);
    }
    throw err;
  }
};
