#!/usr/bin/env tsx
/**
 * preview-sync entry point
 *
 * Exits non-zero on any failure so the invoking scheduler can retry the
 * whole run later.
 */

import { createLogger, PreviewSyncError } from '@preview-sync/shared';
import { createProgram } from './program.ts';

const log = createLogger({ name: 'preview-sync:cli' });

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    if (err instanceof PreviewSyncError) {
      log.error({ code: err.code, error: err.message }, 'Run aborted');
    } else {
      const message = err instanceof Error ? err.message : 'Unknown error';
      log.error({ error: message }, 'Run failed');
    }
    process.exitCode = 1;
  });
