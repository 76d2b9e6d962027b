/**
 * Git Remote Module
 *
 * Reads and deletes refs on the preview remote through the git CLI. No local
 * history is involved: refs are listed with `ls-remote` and removed with a
 * delete-only push.
 */

import { execFileSync } from 'node:child_process';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createLogger } from '../logger/index.ts';
import { GitCommandError } from '../errors/index.ts';

const log = createLogger({ name: 'preview-sync:git' });

const GIT_TIMEOUT_MS = 60_000;

/**
 * A git remote holding the mirrored refs. `refspec` is always relative to
 * `refs/`, e.g. `prs-open/42`.
 */
export interface GitRemote {
  readonly name: string;
  /** Revision the ref points at, or null when the ref does not exist */
  getRevision(refspec: string): string | null;
  deleteRef(refspec: string): void;
}

/**
 * Extract whatever git printed on stderr from an execFileSync failure
 */
function describeFailure(err: unknown): string {
  if (err instanceof Error) {
    const stderr = 'stderr' in err ? err.stderr : undefined;
    const text = typeof stderr === 'string' || Buffer.isBuffer(stderr) ? stderr.toString().trim() : '';
    return text !== '' ? text : err.message;
  }
  return String(err);
}

/**
 * Run git and return its stdout
 */
export function runGit(args: string[], cwd?: string): string {
  try {
    return execFileSync('git', args, {
      cwd,
      encoding: 'utf8',
      stdio: ['ignore', 'pipe', 'pipe'],
      timeout: GIT_TIMEOUT_MS,
    });
  } catch (err) {
    throw new GitCommandError(args, describeFailure(err));
  }
}

/**
 * Parse `git ls-remote` output and return the revision of exactly `ref`.
 * ls-remote patterns match on the ref's tail, so other refs ending in the
 * same path are skipped.
 */
export function parseLsRemote(output: string, ref: string): string | null {
  for (const line of output.split('\n')) {
    const [revision, name] = line.trim().split(/\s+/);
    if (revision !== undefined && revision !== '' && name === ref) {
      return revision;
    }
  }
  return null;
}

/**
 * Run `fn` inside a freshly initialized, empty repository that is removed
 * afterwards. Some git subcommands refuse to run outside a repository even
 * when they touch no local objects.
 */
export function withTemporaryRepository<T>(fn: (directory: string) => T): T {
  const directory = mkdtempSync(join(tmpdir(), 'preview-sync-'));
  try {
    runGit(['init', '--quiet'], directory);
    return fn(directory);
  } finally {
    rmSync(directory, { recursive: true, force: true });
  }
}

export class CliGitRemote implements GitRemote {
  constructor(public readonly name: string) {}

  getRevision(refspec: string): string | null {
    const ref = `refs/${refspec}`;
    const output = runGit(['ls-remote', this.name, ref]);
    const revision = parseLsRemote(output, ref);
    log.debug({ remote: this.name, refspec, revision }, 'Resolved ref');
    return revision;
  }

  deleteRef(refspec: string): void {
    const ref = `refs/${refspec}`;
    log.info({ remote: this.name, refspec }, 'Deleting ref');

    withTemporaryRepository((directory) => {
      runGit(['push', this.name, '--delete', ref], directory);
    });
  }
}
