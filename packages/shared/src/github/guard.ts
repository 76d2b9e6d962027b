/**
 * Rate limit guard
 *
 * This tool shares its API quota with more important consumers, so every
 * call is preceded by a quota check and the run stops rather than eat into
 * the remaining allowance.
 */

import { createLogger } from '../logger/index.ts';
import { QuotaGuardTrippedError } from '../errors/index.ts';

const log = createLogger({ name: 'preview-sync:github:guard' });

/** Remaining/limit ratio below which no further request is issued */
export const API_RATE_LIMIT_THRESHOLD = 0.2;

/** Rate limit categories the tool consumes */
export type RateLimitResource = 'core' | 'search';

export interface RateLimitSnapshot {
  resource: RateLimitResource;
  limit: number;
  remaining: number;
  reset: Date;
  used: number;
}

/**
 * Throw QuotaGuardTrippedError when the snapshot is under the threshold.
 * A zero limit carries no ratio and is let through.
 */
export function assertQuota(
  snapshot: RateLimitSnapshot,
  threshold: number = API_RATE_LIMIT_THRESHOLD
): void {
  const { resource, remaining, limit } = snapshot;

  log.info({ resource, remaining, limit }, 'Rate limit status');

  if (limit > 0 && remaining / limit < threshold) {
    throw new QuotaGuardTrippedError(resource, remaining, limit);
  }
}

/**
 * Compose a quota check with the call it protects. The call is not started
 * unless the check passes.
 */
export async function withQuotaGuard<T>(
  resource: RateLimitResource,
  fetchSnapshot: (resource: RateLimitResource) => Promise<RateLimitSnapshot>,
  call: () => Promise<T>,
  threshold: number = API_RATE_LIMIT_THRESHOLD
): Promise<T> {
  const snapshot = await fetchSnapshot(resource);
  assertQuota(snapshot, threshold);
  return call();
}
