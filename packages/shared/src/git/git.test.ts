/**
 * Git Remote Module Tests
 *
 * Runs against a bare repository in a temporary directory standing in for
 * the preview remote.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { execFileSync } from 'node:child_process';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { CliGitRemote, parseLsRemote, withTemporaryRepository, runGit } from './index.ts';
import { GitCommandError } from '../errors/index.ts';

// =============================================================================
// Test Helpers
// =============================================================================

function git(args: string[], cwd: string): string {
  return execFileSync('git', args, { cwd, encoding: 'utf8', stdio: ['ignore', 'pipe', 'pipe'] }).trim();
}

let testDir: string;
let remotePath: string;
let workPath: string;
let revision: string;

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), 'preview-sync-git-test-'));
  remotePath = join(testDir, 'remote.git');
  workPath = join(testDir, 'work');

  git(['init', '--bare', '--quiet', remotePath], testDir);
  git(['init', '--quiet', workPath], testDir);
  git(
    ['-c', 'user.name=Preview Test', '-c', 'user.email=preview@example.test', 'commit', '--allow-empty', '--quiet', '-m', 'initial'],
    workPath
  );
  revision = git(['rev-parse', 'HEAD'], workPath);
  git(['push', '--quiet', remotePath, 'HEAD:refs/pull/7/head', 'HEAD:refs/prs-open/7'], workPath);
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

// =============================================================================
// parseLsRemote
// =============================================================================

describe('parseLsRemote', () => {
  it('should return the revision of the exact ref', () => {
    const output = 'aaa111\trefs/mirror/refs/prs-open/7\nbbb222\trefs/prs-open/7\n';
    expect(parseLsRemote(output, 'refs/prs-open/7')).toBe('bbb222');
  });

  it('should return null for empty output', () => {
    expect(parseLsRemote('', 'refs/prs-open/7')).toBeNull();
  });

  it('should return null when only other refs match', () => {
    expect(parseLsRemote('aaa111\trefs/prs-open/70\n', 'refs/prs-open/7')).toBeNull();
  });
});

// =============================================================================
// CliGitRemote
// =============================================================================

describe('CliGitRemote', () => {
  it('should resolve an existing ref', () => {
    const remote = new CliGitRemote(remotePath);
    expect(remote.getRevision('prs-open/7')).toBe(revision);
    expect(remote.getRevision('pull/7/head')).toBe(revision);
  });

  it('should return null for a missing ref', () => {
    const remote = new CliGitRemote(remotePath);
    expect(remote.getRevision('prs-labeled-for-preview/7')).toBeNull();
  });

  it('should delete a ref on the remote', () => {
    const remote = new CliGitRemote(remotePath);
    remote.deleteRef('prs-open/7');

    expect(remote.getRevision('prs-open/7')).toBeNull();
    expect(remote.getRevision('pull/7/head')).toBe(revision);
  });

  it('should fail to delete a ref that does not exist', () => {
    const remote = new CliGitRemote(remotePath);
    expect(() => remote.deleteRef('prs-labeled-for-preview/7')).toThrow(GitCommandError);
  });

  it('should fail for an unreachable remote', () => {
    const remote = new CliGitRemote(join(testDir, 'missing.git'));
    expect(() => remote.getRevision('prs-open/7')).toThrow(GitCommandError);
  });
});

// =============================================================================
// withTemporaryRepository
// =============================================================================

describe('withTemporaryRepository', () => {
  it('should provide an initialized repository and remove it afterwards', () => {
    let seen = '';
    const result = withTemporaryRepository((directory) => {
      seen = directory;
      expect(runGit(['rev-parse', '--is-inside-work-tree'], directory).trim()).toBe('true');
      return 42;
    });

    expect(result).toBe(42);
    expect(existsSync(seen)).toBe(false);
  });

  it('should remove the repository when the callback throws', () => {
    let seen = '';
    expect(() =>
      withTemporaryRepository((directory) => {
        seen = directory;
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(seen).not.toBe('');
    expect(existsSync(seen)).toBe(false);
  });
});

describe('runGit', () => {
  it('should report the failing command', () => {
    try {
      runGit(['rev-parse', '--verify', 'refs/heads/does-not-exist'], workPath);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(GitCommandError);
      expect(err).toMatchObject({
        code: 'git_command_failed',
        args: ['rev-parse', '--verify', 'refs/heads/does-not-exist'],
      });
    }
  });
});
