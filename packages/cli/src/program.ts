/**
 * Command-line interface
 *
 *   preview-sync --host <url> --github-project <owner/repo> synchronize --remote <remote> --window <seconds>
 *   preview-sync --host <url> --github-project <owner/repo> detect --target <url> --timeout <seconds>
 */

import { Command, InvalidArgumentError } from 'commander';
import {
  validateNumber,
  validateProject,
  validateRemote,
  validateUrl,
  type ValidationResult,
} from '@preview-sync/shared';
import { runSynchronizeCommand, type SynchronizeCommandOptions } from './synchronize.ts';
import { runDetectCommand, type DetectCommandOptions } from './detect.ts';

export interface CommandHandlers {
  synchronize: (options: SynchronizeCommandOptions) => Promise<unknown>;
  detect: (options: DetectCommandOptions) => Promise<unknown>;
}

const defaultHandlers: CommandHandlers = {
  synchronize: runSynchronizeCommand,
  detect: runDetectCommand,
};

function check(result: ValidationResult): void {
  if (!result.valid) {
    throw new InvalidArgumentError(result.error ?? 'Invalid value.');
  }
}

export function parseSeconds(value: string): number {
  check(validateNumber(value, { min: 1 }));
  return Number.parseInt(value, 10);
}

export function parseUrlOption(value: string): string {
  check(validateUrl(value));
  return value;
}

export function parseProjectOption(value: string): string {
  check(validateProject(value));
  return value;
}

export function parseRemoteOption(value: string): string {
  check(validateRemote(value));
  return value;
}

export function createProgram(handlers: CommandHandlers = defaultHandlers): Command {
  const program = new Command('preview-sync')
    .description('Keep pull request previews in step with GitHub')
    .requiredOption('--host <url>', 'the location of the GitHub API server', parseUrlOption)
    .requiredOption(
      '--github-project <owner/repo>',
      'the GitHub organization and project name, separated by a forward slash (e.g. "octo-org/widgets")',
      parseProjectOption
    );

  program
    .command('synchronize')
    .description(
      'Inspect all pull requests modified in a given window of time, adding or removing the ' +
        'preview label and updating or deleting the mirror refs of each'
    )
    .requiredOption(
      '--remote <remote>',
      'URL or absolute path of the git remote holding the mirror refs',
      parseRemoteOption
    )
    .requiredOption('--window <seconds>', 'how far back to look for updated pull requests', parseSeconds)
    .action(async (_options: unknown, command: Command) => {
      await handlers.synchronize(command.optsWithGlobals<SynchronizeCommandOptions>());
    });

  program
    .command('detect')
    .description(
      'Follow the deployment named in GITHUB_EVENT_PATH, polling the preview host until it is ' +
        'live or the timeout is reached'
    )
    .requiredOption('--target <url>', 'the preview host', parseUrlOption)
    .requiredOption('--timeout <seconds>', 'how long to wait for the deployment', parseSeconds)
    .action(async (_options: unknown, command: Command) => {
      await handlers.detect(command.optsWithGlobals<DetectCommandOptions>());
    });

  return program;
}
