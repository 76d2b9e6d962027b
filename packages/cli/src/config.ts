/**
 * CLI configuration: command-line values plus the environment they need.
 */

import { parseProject, validateConfig, type ConfigField, type ForgeConfig } from '@preview-sync/shared';

export interface ProjectOptions {
  host: string;
  githubProject: string;
}

const GITHUB_TOKEN: ConfigField = {
  name: 'GITHUB_TOKEN',
  type: 'string',
  required: true,
  description: 'GitHub API token',
};

const GITHUB_EVENT_PATH: ConfigField = {
  name: 'GITHUB_EVENT_PATH',
  type: 'path',
  required: true,
  description: 'JSON payload of the deployment event',
};

function toForgeConfig(options: ProjectOptions, token: string): ForgeConfig {
  const { owner, repo } = parseProject(options.githubProject);
  return { host: options.host, owner, repo, token };
}

/**
 * Build the forge connection settings. The token only ever comes from the
 * environment.
 */
export function loadForgeConfig(options: ProjectOptions): ForgeConfig {
  const env = validateConfig([GITHUB_TOKEN]);
  return toForgeConfig(options, env.get(GITHUB_TOKEN.name) ?? '');
}

/**
 * Forge settings plus the path of the JSON payload describing the
 * triggering event
 */
export function loadDetectConfig(options: ProjectOptions): { forge: ForgeConfig; eventPath: string } {
  const env = validateConfig([GITHUB_TOKEN, GITHUB_EVENT_PATH]);
  return {
    forge: toForgeConfig(options, env.get(GITHUB_TOKEN.name) ?? ''),
    eventPath: env.get(GITHUB_EVENT_PATH.name) ?? '',
  };
}
