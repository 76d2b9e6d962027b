import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { InvalidEventPayloadError } from '@preview-sync/shared';
import { parseDeploymentEvent, readDeploymentEvent } from './event.ts';

describe('parseDeploymentEvent', () => {
  it('should extract the deployment', () => {
    const payload = {
      action: 'created',
      deployment: { id: 555, environment: '7', sha: 'abc123', ref: 'abc123', task: 'deploy' },
    };

    expect(parseDeploymentEvent(payload)).toEqual({ id: 555, environment: '7', sha: 'abc123' });
  });

  it('should reject a payload without a deployment', () => {
    expect(() => parseDeploymentEvent({ action: 'created' })).toThrow(
      'Event payload has no "deployment" object'
    );
  });

  it('should reject a non-object payload', () => {
    expect(() => parseDeploymentEvent([1, 2])).toThrow(InvalidEventPayloadError);
  });

  it('should reject a non-integer id', () => {
    expect(() => parseDeploymentEvent({ deployment: { id: '555', environment: '7', sha: 'abc123' } })).toThrow(
      'Deployment "id" must be an integer'
    );
  });

  it('should reject an environment that is not a pull request number', () => {
    expect(() =>
      parseDeploymentEvent({ deployment: { id: 555, environment: 'production', sha: 'abc123' } })
    ).toThrow('Deployment "environment" must be a pull request number, got "production"');
  });

  it('should reject a missing sha', () => {
    expect(() => parseDeploymentEvent({ deployment: { id: 555, environment: '7' } })).toThrow(
      'Deployment "sha" must be a non-empty string'
    );
  });
});

describe('readDeploymentEvent', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'preview-sync-event-test-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should return the deployment and the raw payload', () => {
    const path = join(testDir, 'event.json');
    const payload = { deployment: { id: 1, environment: '42', sha: 'def456' } };
    writeFileSync(path, JSON.stringify(payload));

    expect(readDeploymentEvent(path)).toEqual({
      deployment: { id: 1, environment: '42', sha: 'def456' },
      payload,
    });
  });

  it('should reject a file that is not JSON', () => {
    const path = join(testDir, 'event.json');
    writeFileSync(path, 'deployment=1');

    expect(() => readDeploymentEvent(path)).toThrow(InvalidEventPayloadError);
  });
});
