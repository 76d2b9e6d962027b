/**
 * Readiness check against the preview host.
 *
 * The host keeps one git worktree per pull request; a deployment is live
 * once that worktree's HEAD names the deployed commit.
 */

import { fetch } from 'undici';
import { createLogger } from '@preview-sync/shared';
import type { DeploymentEvent } from './event.ts';

const log = createLogger({ name: 'preview-sync:deployment-check' });

/** `timeoutMs` bounds the whole request, body included */
export type DeploymentCheck = (target: string, deployment: DeploymentEvent, timeoutMs: number) => Promise<boolean>;

export function worktreeHeadUrl(target: string, deployment: DeploymentEvent): string {
  return `${target.replace(/\/+$/, '')}/.git/worktrees/${deployment.environment}/HEAD`;
}

/**
 * True when the preview host serves `deployment.sha` for the pull request.
 * An unreachable, failing or silent host means "not yet".
 */
export const isDeployed: DeploymentCheck = async (target, deployment, timeoutMs) => {
  const url = worktreeHeadUrl(target, deployment);
  log.info({ url, timeoutMs }, 'Issuing request');

  try {
    const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    // Drain the body before deciding
    const body = await response.text();
    log.debug({ url, status: response.status }, 'Preview host responded');

    return response.status === 200 && body.trim() === deployment.sha;
  } catch (err) {
    log.warn({ url, error: err instanceof Error ? err.message : String(err) }, 'Preview host unreachable');
    return false;
  }
};
