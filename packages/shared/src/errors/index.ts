/**
 * Error classes
 *
 * Every failure is fatal for the current run. Nothing here is retried; the
 * scheduler that invokes the CLI runs it again later.
 */

export class PreviewSyncError extends Error {
  constructor(message: string, public readonly code: string = 'preview_sync_error') {
    super(message);
    this.name = 'PreviewSyncError';
  }
}

export class QuotaGuardTrippedError extends PreviewSyncError {
  public readonly resource: string;
  public readonly remaining: number;
  public readonly limit: number;

  constructor(resource: string, remaining: number, limit: number) {
    super(
      `Exiting to avoid GitHub API request throttling (${resource}: ${remaining}/${limit} remaining)`,
      'quota_guard_tripped'
    );
    this.name = 'QuotaGuardTrippedError';
    this.resource = resource;
    this.remaining = remaining;
    this.limit = limit;
  }
}

export class ForgeRequestFailedError extends PreviewSyncError {
  public readonly status: number;
  public readonly route: string;

  constructor(route: string, status: number, detail: string) {
    super(`${route} failed with status ${status}: ${detail}`, 'forge_request_failed');
    this.name = 'ForgeRequestFailedError';
    this.status = status;
    this.route = route;
  }
}

export class IncompleteSearchResultsError extends PreviewSyncError {
  constructor(query: string) {
    super(`Search returned incomplete results for query: ${query}`, 'incomplete_search_results');
    this.name = 'IncompleteSearchResultsError';
  }
}

export class DeploymentTimeoutError extends PreviewSyncError {
  public readonly timeoutSeconds: number;

  constructor(timeoutSeconds: number) {
    super(
      `Deployment did not become available after ${timeoutSeconds} seconds`,
      'deployment_timeout'
    );
    this.name = 'DeploymentTimeoutError';
    this.timeoutSeconds = timeoutSeconds;
  }
}

export class GitCommandError extends PreviewSyncError {
  public readonly args: string[];

  constructor(args: string[], detail: string) {
    super(`git ${args.join(' ')} failed: ${detail}`, 'git_command_failed');
    this.name = 'GitCommandError';
    this.args = args;
  }
}

export class PullRequestHeadNotFoundError extends PreviewSyncError {
  constructor(pullNumber: number, remote: string) {
    super(
      `Head revision of pull request #${pullNumber} not found on remote "${remote}"`,
      'pull_request_head_not_found'
    );
    this.name = 'PullRequestHeadNotFoundError';
  }
}

export class InvalidEventPayloadError extends PreviewSyncError {
  constructor(message: string) {
    super(message, 'invalid_event_payload');
    this.name = 'InvalidEventPayloadError';
  }
}

export class ConfigurationError extends PreviewSyncError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration errors:\n  - ${errors.join('\n  - ')}`, 'invalid_configuration');
    this.name = 'ConfigurationError';
    this.errors = errors;
  }
}
