/**
 * Deployment event payloads, as written by the workflow runner to the file
 * named in GITHUB_EVENT_PATH.
 */

import { readFileSync } from 'node:fs';
import { InvalidEventPayloadError } from '@preview-sync/shared';

export interface DeploymentEvent {
  id: number;
  /** Pull request number, as a string */
  environment: string;
  sha: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate the `deployment` object of an event payload
 */
export function parseDeploymentEvent(payload: unknown): DeploymentEvent {
  if (!isRecord(payload) || !isRecord(payload['deployment'])) {
    throw new InvalidEventPayloadError('Event payload has no "deployment" object');
  }

  const deployment = payload['deployment'];
  const id = deployment['id'];
  const environment = deployment['environment'];
  const sha = deployment['sha'];

  if (typeof id !== 'number' || !Number.isInteger(id)) {
    throw new InvalidEventPayloadError('Deployment "id" must be an integer');
  }
  if (typeof environment !== 'string' || !/^\d+$/.test(environment)) {
    throw new InvalidEventPayloadError(
      `Deployment "environment" must be a pull request number, got ${JSON.stringify(environment)}`
    );
  }
  if (typeof sha !== 'string' || sha === '') {
    throw new InvalidEventPayloadError('Deployment "sha" must be a non-empty string');
  }

  return { id, environment, sha };
}

/**
 * Read and validate the event file. The raw payload is returned as well so
 * it can be logged.
 */
export function readDeploymentEvent(path: string): { deployment: DeploymentEvent; payload: unknown } {
  const raw = readFileSync(path, 'utf8');

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (err) {
    throw new InvalidEventPayloadError(
      `Event payload at ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return { deployment: parseDeploymentEvent(payload), payload };
}
