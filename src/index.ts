/**
 * =============================================================================
 * Entry point
 * =============================================================================
 */

import { auditLog } from './core/audit-log';
import { describeThrown } from './core/errors';
import { runReorderBot } from './app';

runReorderBot()
  .then((exitCode) => {
    if (exitCode !== 0) process.exit(exitCode);
  })
  .catch((error: unknown) => {
    auditLog.record('STARTUP_FAILED', { error: describeThrown(error) });
    process.exit(1);
  });
