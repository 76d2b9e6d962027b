/**
 * Detect: follow one deployment until the preview host serves it, reporting
 * progress as GitHub deployment statuses.
 */

import { setTimeout as delay } from 'node:timers/promises';
import {
  createLogger,
  ForgeClient,
  DeploymentTimeoutError,
  type DeploymentState,
  type DeploymentStatusOptions,
} from '@preview-sync/shared';
import { loadDetectConfig } from './config.ts';
import { readDeploymentEvent, type DeploymentEvent } from './event.ts';
import { isDeployed, type DeploymentCheck } from './deployment-check.ts';

const log = createLogger({ name: 'preview-sync:detect' });

/** Seconds between readiness checks */
export const POLLING_PERIOD_SECONDS = 5;

export type DeploymentStatusForge = Pick<ForgeClient, 'updateDeploymentStatus'>;

export interface DetectOptions {
  /** Preview host, e.g. https://previews.example.test */
  target: string;
  timeoutSeconds: number;
  pollIntervalSeconds?: number;
}

export interface DetectDependencies {
  forge: DeploymentStatusForge;
  isDeployed?: DeploymentCheck;
  sleep?: (ms: number) => Promise<void>;
  /** Milliseconds clock */
  now?: () => number;
}

export interface DetectResult {
  attempts: number;
  elapsedSeconds: number;
}

/**
 * URL reported with each deployment status
 */
export function environmentUrl(target: string, deployment: DeploymentEvent): string {
  return `${target.replace(/\/+$/, '')}/submissions/${deployment.environment}/`;
}

/**
 * Mark the deployment in progress, then poll until it is live (success) or
 * until another poll would overrun the timeout (error). No single check
 * outlasts the poll interval or the time left.
 */
export async function detect(
  deployment: DeploymentEvent,
  options: DetectOptions,
  deps: DetectDependencies
): Promise<DetectResult> {
  const check = deps.isDeployed ?? isDeployed;
  const sleep = deps.sleep ?? ((ms: number) => delay(ms));
  const now = deps.now ?? Date.now;
  const intervalMs = (options.pollIntervalSeconds ?? POLLING_PERIOD_SECONDS) * 1000;
  const timeoutMs = options.timeoutSeconds * 1000;
  const pullNumber = Number.parseInt(deployment.environment, 10);

  const report = (state: DeploymentState, statusOptions: DeploymentStatusOptions = {}) =>
    deps.forge.updateDeploymentStatus(deployment.id, state, {
      environmentUrl: environmentUrl(options.target, deployment),
      ...statusOptions,
    });

  await report('in_progress');

  log.info(
    { pullNumber, target: options.target, timeoutSeconds: options.timeoutSeconds },
    'Waiting for pull request to be deployed'
  );

  const start = now();
  let attempts = 0;

  for (;;) {
    attempts++;

    const remainingMs = Math.max(timeoutMs - (now() - start), 1);
    if (await check(options.target, deployment, Math.min(intervalMs, remainingMs))) {
      const elapsedSeconds = (now() - start) / 1000;
      log.info({ pullNumber, attempts, elapsedSeconds }, 'Deployment is live');
      await report('success');
      return { attempts, elapsedSeconds };
    }

    const elapsedMs = now() - start;
    if (elapsedMs + intervalMs > timeoutMs) {
      const error = new DeploymentTimeoutError(options.timeoutSeconds);
      log.error({ pullNumber, attempts }, error.message);
      await report('error', { description: error.message });
      throw error;
    }

    log.debug({ pullNumber, attempts }, 'Not deployed yet');
    await sleep(intervalMs);
  }
}

export interface DetectCommandOptions {
  host: string;
  githubProject: string;
  target: string;
  timeout: number;
}

/**
 * `detect` subcommand
 */
export async function runDetectCommand(options: DetectCommandOptions): Promise<DetectResult> {
  const config = loadDetectConfig(options);
  const { deployment, payload } = readDeploymentEvent(config.eventPath);

  log.info({ event: payload }, 'Event data');

  const forge = new ForgeClient(config.forge);
  return detect(deployment, { target: options.target, timeoutSeconds: options.timeout }, { forge });
}
