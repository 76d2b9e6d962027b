/**
 * Synchronize: converge labels, mirror refs and deployments with the state
 * of recently updated pull requests.
 *
 * Pull requests are handled one at a time in search order. Any failure
 * aborts the rest of the pass; the next scheduled run starts over from the
 * remote's refs.
 */

import {
  createLogger,
  childLogger,
  ForgeClient,
  CliGitRemote,
  PullRequestHeadNotFoundError,
  type GitRemote,
  type PullRequestSummary,
} from '@preview-sync/shared';
import { loadForgeConfig } from './config.ts';
import {
  PREVIEW_LABEL,
  hasLabel,
  headRefspec,
  isOpen,
  labeledRefspec,
  openRefspec,
  shouldBeMirrored,
} from './preview.ts';

const log = createLogger({ name: 'preview-sync:synchronize' });

export type PreviewForge = Pick<
  ForgeClient,
  'searchPullRequests' | 'addLabel' | 'removeLabel' | 'createRef' | 'updateRef' | 'createDeployment'
>;

export type Mutation =
  | { kind: 'label_added'; pullNumber: number }
  | { kind: 'label_removed'; pullNumber: number }
  | { kind: 'ref_created'; pullNumber: number; refspec: string; revision: string }
  | { kind: 'ref_updated'; pullNumber: number; refspec: string; revision: string }
  | { kind: 'ref_deleted'; pullNumber: number; refspec: string }
  | { kind: 'deployment_created'; pullNumber: number; revision: string; deploymentId: number | null };

export interface SynchronizeOptions {
  /** Only pull requests updated within this many seconds are inspected */
  windowSeconds: number;
  now?: () => Date;
}

export interface SynchronizeResult {
  pullRequests: number;
  mutations: Mutation[];
}

/**
 * Bring one pull request's label, refs and deployment in line with whether
 * it should be mirrored. Returns the mutations issued, in order.
 */
export async function reconcilePullRequest(
  forge: PreviewForge,
  remote: GitRemote,
  pullRequest: PullRequestSummary
): Promise<Mutation[]> {
  const pullNumber = pullRequest.number;
  const prLog = childLogger(log, { pullNumber });
  const mutations: Mutation[] = [];

  const refspecLabeled = labeledRefspec(pullNumber);
  const refspecOpen = openRefspec(pullNumber);
  const revisionLabeled = remote.getRevision(refspecLabeled);
  const revisionOpen = remote.getRevision(refspecOpen);

  if (shouldBeMirrored(pullRequest)) {
    prLog.info('Pull request should be mirrored');

    const revisionLatest = remote.getRevision(headRefspec(pullNumber));
    if (revisionLatest === null) {
      throw new PullRequestHeadNotFoundError(pullNumber, remote.name);
    }

    if (!hasLabel(pullRequest)) {
      await forge.addLabel(pullNumber, PREVIEW_LABEL);
      mutations.push({ kind: 'label_added', pullNumber });
    }

    if (revisionLabeled !== revisionLatest) {
      if (revisionLabeled === null) {
        await forge.createRef(refspecLabeled, revisionLatest);
        mutations.push({ kind: 'ref_created', pullNumber, refspec: refspecLabeled, revision: revisionLatest });
      } else {
        await forge.updateRef(refspecLabeled, revisionLatest);
        mutations.push({ kind: 'ref_updated', pullNumber, refspec: refspecLabeled, revision: revisionLatest });
      }

      const deploymentId = await forge.createDeployment(pullNumber, revisionLatest);
      mutations.push({ kind: 'deployment_created', pullNumber, revision: revisionLatest, deploymentId });
    }

    if (revisionOpen === null) {
      await forge.createRef(refspecOpen, revisionLatest);
      mutations.push({ kind: 'ref_created', pullNumber, refspec: refspecOpen, revision: revisionLatest });
    } else if (revisionOpen !== revisionLatest) {
      await forge.updateRef(refspecOpen, revisionLatest);
      mutations.push({ kind: 'ref_updated', pullNumber, refspec: refspecOpen, revision: revisionLatest });
    }
  } else {
    prLog.info('Pull request should not be mirrored');

    if (hasLabel(pullRequest)) {
      await forge.removeLabel(pullNumber, PREVIEW_LABEL);
      mutations.push({ kind: 'label_removed', pullNumber });
    }

    if (revisionLabeled !== null) {
      remote.deleteRef(refspecLabeled);
      mutations.push({ kind: 'ref_deleted', pullNumber, refspec: refspecLabeled });
    }

    if (revisionOpen !== null && !isOpen(pullRequest)) {
      remote.deleteRef(refspecOpen);
      mutations.push({ kind: 'ref_deleted', pullNumber, refspec: refspecOpen });
    }
  }

  prLog.debug({ mutations: mutations.length }, 'Pull request reconciled');
  return mutations;
}

/**
 * Inspect every pull request updated in the trailing window and reconcile
 * each in turn.
 */
export async function synchronize(
  forge: PreviewForge,
  remote: GitRemote,
  options: SynchronizeOptions
): Promise<SynchronizeResult> {
  const now = options.now?.() ?? new Date();
  const updatedSince = new Date(now.getTime() - options.windowSeconds * 1000);

  const pullRequests = await forge.searchPullRequests(updatedSince);
  const mutations: Mutation[] = [];

  for (const pullRequest of pullRequests) {
    log.info({ pullNumber: pullRequest.number }, 'Processing pull request');
    mutations.push(...(await reconcilePullRequest(forge, remote, pullRequest)));
  }

  log.info(
    {
      pullRequests: pullRequests.length,
      mutations: mutations.length,
      deployments: mutations.filter((m) => m.kind === 'deployment_created').length,
    },
    'Synchronization complete'
  );

  return { pullRequests: pullRequests.length, mutations };
}

export interface SynchronizeCommandOptions {
  host: string;
  githubProject: string;
  remote: string;
  window: number;
}

/**
 * `synchronize` subcommand
 */
export async function runSynchronizeCommand(options: SynchronizeCommandOptions): Promise<SynchronizeResult> {
  const config = loadForgeConfig(options);
  const forge = new ForgeClient(config);
  const remote = new CliGitRemote(options.remote);

  return synchronize(forge, remote, { windowSeconds: options.window });
}
