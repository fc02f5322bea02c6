import type { RetryConfig } from '../config/index.js';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = ms =>
  new Promise(resolve => {
    setTimeout(resolve, ms);
  });

/**
 * Re-runs `attempt` while it reports failure, up to `policy.attempts` calls in
 * total. Results carry their own success flag, so nothing is thrown here.
 */
export async function withRetry<T extends { ok: boolean }>(
  policy: RetryConfig,
  attempt: (attemptNumber: number) => Promise<T>,
  sleep: Sleep = defaultSleep
): Promise<T> {
  const attempts = Math.max(1, Math.floor(policy.attempts));
  let result = await attempt(1);
  for (let attemptNumber = 2; attemptNumber <= attempts && !result.ok; attemptNumber += 1) {
    if (policy.backoffMs > 0) {
      await sleep(policy.backoffMs * (attemptNumber - 1));
    }
    result = await attempt(attemptNumber);
  }
  return result;
}
