export const MIN_RETRY_DELAY_MS = 1_000;
export const MAX_RETRY_DELAY_MS = 5_000;

/**
 * Uniformly random wait in `[MIN_RETRY_DELAY_MS, MAX_RETRY_DELAY_MS)`.
 * Concurrent builds that collided must not retry in lockstep.
 */
export function computeRetryDelay(random: () => number = Math.random): number {
  const span = MAX_RETRY_DELAY_MS - MIN_RETRY_DELAY_MS;
  const offset = Math.min(Math.floor(random() * span), span - 1);
  return MIN_RETRY_DELAY_MS + Math.max(offset, 0);
}
