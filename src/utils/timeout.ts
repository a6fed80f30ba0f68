/**
 * Time budget enforcement for external capability calls
 *
 * @module utils/timeout
 */

import { ExternalCapabilityError, PipelineError } from '../server/errors.js';

/**
 * Race `operation` against a timer. On expiry the returned promise rejects
 * with ExternalCapabilityError (category EXTERNAL_TIMEOUT). Failures of the
 * operation itself are wrapped as EXTERNAL_CAPABILITY_ERROR unless they are
 * already typed pipeline errors.
 *
 * The timer is always cleared, so no handle outlives the call.
 */
export async function withTimeout<T>(
  operation: () => Promise<T>,
  timeoutMs: number,
  capability: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(
        new ExternalCapabilityError(capability, `${capability} exceeded time budget of ${timeoutMs}ms`, {
          timeout: true,
        })
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([invoke(operation, capability), timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}

async function invoke<T>(operation: () => Promise<T>, capability: string): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof PipelineError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ExternalCapabilityError(capability, `${capability} failed: ${message}`, { cause: error });
  }
}
