/**
 * GitHub Integration Module
 *
 * Token-authenticated Octokit creation, rate limit lookups, and request
 * error normalization.
 */

import { Octokit } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';
import { createLogger } from '../logger/index.ts';
import { ForgeRequestFailedError } from '../errors/index.ts';
import type { RateLimitResource, RateLimitSnapshot } from './guard.ts';

const log = createLogger({ name: 'preview-sync:github' });

/**
 * Media type requested on every call. Deployments with an empty
 * `required_contexts` list were introduced under this preview.
 */
export const FORGE_MEDIA_TYPE = 'application/vnd.github.machine-man-preview+json';

/**
 * Connection settings for a single GitHub project
 */
export interface ForgeConfig {
  /** API root, e.g. https://api.github.com */
  host: string;
  /** Organization or user owning the project */
  owner: string;
  /** Repository name */
  repo: string;
  /** Token sent as `Authorization: token <value>` */
  token: string;
}

/**
 * Split an `owner/repo` slug
 */
export function parseProject(project: string): { owner: string; repo: string } {
  const [owner, repo, ...rest] = project.split('/');
  if (owner === undefined || owner === '' || repo === undefined || repo === '' || rest.length > 0) {
    throw new Error(`Invalid GitHub project "${project}", expected "owner/repo"`);
  }
  return { owner, repo };
}

/**
 * Create an Octokit instance for the configured host
 */
export function createForgeOctokit(config: ForgeConfig): Octokit {
  log.debug({ host: config.host, owner: config.owner, repo: config.repo }, 'Creating GitHub client');

  return new Octokit({
    auth: config.token,
    baseUrl: config.host.replace(/\/+$/, ''),
    userAgent: 'pr-preview-sync/0.1.0',
  });
}

/**
 * Fetch the current allowance for one resource category.
 *
 * > Accessing this endpoint does not count against your REST API rate limit.
 */
export async function getRateLimitStatus(
  octokit: Octokit,
  resource: RateLimitResource
): Promise<RateLimitSnapshot> {
  const { data } = await octokit
    .request('GET /rate_limit', { headers: { accept: FORGE_MEDIA_TYPE } })
    .catch((err: unknown) => {
      throw translateRequestError('GET /rate_limit', err);
    });

  const values = data.resources[resource];

  return {
    resource,
    limit: values.limit,
    remaining: values.remaining,
    reset: new Date(values.reset * 1000),
    used: values.used,
  };
}

/**
 * Map Octokit's RequestError onto ForgeRequestFailedError. Anything else
 * (programming errors, aborted sockets) is passed through untouched.
 */
export function translateRequestError(route: string, err: unknown): unknown {
  if (err instanceof RequestError) {
    log.error({ route, status: err.status }, 'GitHub request failed');
    return new ForgeRequestFailedError(route, err.status, err.message);
  }
  return err;
}

export type { Octokit };

export * from './guard.ts';
export * from './client.ts';
