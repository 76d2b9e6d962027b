/**
 * GitHub API Client
 *
 * The handful of GitHub operations the preview workflow needs. Every call is
 * wrapped in the rate limit guard and any non-2xx response surfaces as a
 * ForgeRequestFailedError.
 */

import {
  createForgeOctokit,
  getRateLimitStatus,
  translateRequestError,
  FORGE_MEDIA_TYPE,
  type ForgeConfig,
  type Octokit,
} from './index.ts';
import { withQuotaGuard, API_RATE_LIMIT_THRESHOLD, type RateLimitResource } from './guard.ts';
import { IncompleteSearchResultsError } from '../errors/index.ts';
import { createLogger } from '../logger/index.ts';

const log = createLogger({ name: 'preview-sync:github-client' });

// =============================================================================
// Constants
// =============================================================================

const SEARCH_PAGE_SIZE = 100;

/** The search API stops at 1000 results */
const MAX_SEARCH_PAGES = 10;

// =============================================================================
// Types
// =============================================================================

export interface PullRequestSummary {
  number: number;
  /** null while the pull request is open */
  closedAt: string | null;
  /** e.g. OWNER, MEMBER, COLLABORATOR, CONTRIBUTOR, NONE */
  authorAssociation: string;
  labels: string[];
}

export type DeploymentState = 'in_progress' | 'success' | 'error';

export interface DeploymentStatusOptions {
  description?: string;
  environmentUrl?: string;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Format a timestamp for the `updated:>` search qualifier (UTC, second
 * precision).
 */
export function formatSearchTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

// =============================================================================
// GitHub Client Class
// =============================================================================

export class ForgeClient {
  private readonly octokit: Octokit;
  private readonly owner: string;
  private readonly repo: string;
  private readonly headers = { accept: FORGE_MEDIA_TYPE };

  constructor(config: ForgeConfig) {
    this.octokit = createForgeOctokit(config);
    this.owner = config.owner;
    this.repo = config.repo;
  }

  get project(): string {
    return `${this.owner}/${this.repo}`;
  }

  /**
   * Check the quota for `resource`, then issue `call`. Request failures from
   * either step become ForgeRequestFailedError.
   */
  private async guarded<T>(
    resource: RateLimitResource,
    route: string,
    call: () => Promise<T>
  ): Promise<T> {
    return withQuotaGuard(
      resource,
      (r) => getRateLimitStatus(this.octokit, r),
      async () => {
        log.info({ route }, 'Issuing request');
        try {
          return await call();
        } catch (err) {
          throw translateRequestError(route, err);
        }
      },
      API_RATE_LIMIT_THRESHOLD
    );
  }

  // ===========================================================================
  // Search
  // ===========================================================================

  /**
   * List pull requests updated after `updatedSince`, in the order returned by
   * the search API. Throws before returning anything if GitHub reports the
   * result set as incomplete.
   */
  async searchPullRequests(updatedSince: Date): Promise<PullRequestSummary[]> {
    const windowStart = formatSearchTimestamp(updatedSince);
    const q = `repo:${this.project} is:pr updated:>${windowStart}`;
    const pullRequests: PullRequestSummary[] = [];

    log.info({ windowStart }, 'Searching for pull requests');

    for (let page = 1; page <= MAX_SEARCH_PAGES; page++) {
      const { data } = await this.guarded('search', 'GET /search/issues', () =>
        this.octokit.request('GET /search/issues', {
          q,
          per_page: SEARCH_PAGE_SIZE,
          page,
          headers: this.headers,
        })
      );

      if (data.incomplete_results) {
        throw new IncompleteSearchResultsError(q);
      }

      for (const item of data.items) {
        pullRequests.push({
          number: item.number,
          closedAt: item.closed_at,
          authorAssociation: item.author_association,
          labels: item.labels
            .map((label) => label.name)
            .filter((name): name is string => name !== undefined),
        });
      }

      if (data.items.length < SEARCH_PAGE_SIZE) break;
    }

    log.info({ count: pullRequests.length }, 'Found pull requests');
    return pullRequests;
  }

  // ===========================================================================
  // Labels
  // ===========================================================================

  async addLabel(pullNumber: number, name: string): Promise<void> {
    log.info({ pullNumber, label: name }, 'Adding label');

    await this.guarded('core', 'POST /repos/{owner}/{repo}/issues/{issue_number}/labels', () =>
      this.octokit.request('POST /repos/{owner}/{repo}/issues/{issue_number}/labels', {
        owner: this.owner,
        repo: this.repo,
        issue_number: pullNumber,
        labels: [name],
        headers: this.headers,
      })
    );
  }

  async removeLabel(pullNumber: number, name: string): Promise<void> {
    log.info({ pullNumber, label: name }, 'Removing label');

    await this.guarded('core', 'DELETE /repos/{owner}/{repo}/issues/{issue_number}/labels/{name}', () =>
      this.octokit.request('DELETE /repos/{owner}/{repo}/issues/{issue_number}/labels/{name}', {
        owner: this.owner,
        repo: this.repo,
        issue_number: pullNumber,
        name,
        headers: this.headers,
      })
    );
  }

  // ===========================================================================
  // Git References
  // ===========================================================================

  /**
   * Create `refs/<refspec>` pointing at `sha`
   */
  async createRef(refspec: string, sha: string): Promise<void> {
    log.info({ refspec, sha }, 'Creating ref');

    await this.guarded('core', 'POST /repos/{owner}/{repo}/git/refs', () =>
      this.octokit.request('POST /repos/{owner}/{repo}/git/refs', {
        owner: this.owner,
        repo: this.repo,
        ref: `refs/${refspec}`,
        sha,
        headers: this.headers,
      })
    );
  }

  /**
   * Move `refs/<refspec>` to `sha`. Forced, since pull request heads are
   * routinely rewritten.
   */
  async updateRef(refspec: string, sha: string): Promise<void> {
    log.info({ refspec, sha }, 'Updating ref');

    await this.guarded('core', 'PATCH /repos/{owner}/{repo}/git/refs/{ref}', () =>
      this.octokit.request('PATCH /repos/{owner}/{repo}/git/refs/{ref}', {
        owner: this.owner,
        repo: this.repo,
        ref: refspec,
        sha,
        force: true,
        headers: this.headers,
      })
    );
  }

  // ===========================================================================
  // Deployments
  // ===========================================================================

  /**
   * Create a deployment of `sha` for a pull request. Returns the deployment
   * id, or null when GitHub accepted the request without creating one.
   */
  async createDeployment(pullNumber: number, sha: string): Promise<number | null> {
    log.info({ pullNumber, sha }, 'Creating deployment');

    const { data } = await this.guarded('core', 'POST /repos/{owner}/{repo}/deployments', () =>
      this.octokit.request('POST /repos/{owner}/{repo}/deployments', {
        owner: this.owner,
        repo: this.repo,
        ref: sha,
        // One environment per pull request: GitHub marks earlier deployments
        // to the same environment inactive.
        environment: String(pullNumber),
        // Previews are built regardless of commit status checks.
        required_contexts: [],
        headers: this.headers,
      })
    );

    return 'id' in data ? data.id : null;
  }

  async updateDeploymentStatus(
    deploymentId: number,
    state: DeploymentState,
    options: DeploymentStatusOptions = {}
  ): Promise<void> {
    log.info({ deploymentId, state }, 'Updating deployment status');

    await this.guarded('core', 'POST /repos/{owner}/{repo}/deployments/{deployment_id}/statuses', () =>
      this.octokit.request('POST /repos/{owner}/{repo}/deployments/{deployment_id}/statuses', {
        owner: this.owner,
        repo: this.repo,
        deployment_id: deploymentId,
        state,
        description: options.description ?? '',
        ...(options.environmentUrl !== undefined ? { environment_url: options.environmentUrl } : {}),
        headers: this.headers,
      })
    );
  }
}
