/**
 * Pull request preview rules: which pull requests are mirrored, and the refs
 * that mirror them.
 */

import type { PullRequestSummary } from '@preview-sync/shared';

/** Label marking a pull request that should have a live preview */
export const PREVIEW_LABEL = 'pull-request-has-preview';

/** Authors with this association get a preview without the label */
export const TRUSTED_AUTHOR_ASSOCIATION = 'COLLABORATOR';

type PreviewFields = Pick<PullRequestSummary, 'closedAt' | 'authorAssociation' | 'labels'>;

export function labeledRefspec(pullNumber: number): string {
  return `prs-labeled-for-preview/${pullNumber}`;
}

export function openRefspec(pullNumber: number): string {
  return `prs-open/${pullNumber}`;
}

/** Ref GitHub maintains for every pull request's head commit */
export function headRefspec(pullNumber: number): string {
  return `pull/${pullNumber}/head`;
}

export function isOpen(pullRequest: Pick<PullRequestSummary, 'closedAt'>): boolean {
  return pullRequest.closedAt === null || pullRequest.closedAt === '';
}

export function hasLabel(pullRequest: Pick<PullRequestSummary, 'labels'>): boolean {
  return pullRequest.labels.includes(PREVIEW_LABEL);
}

export function shouldBeMirrored(pullRequest: PreviewFields): boolean {
  return (
    isOpen(pullRequest) &&
    (pullRequest.authorAssociation === TRUSTED_AUTHOR_ASSOCIATION || hasLabel(pullRequest))
  );
}
