/**
 * Centralized Vitest setup.
 *
 * Resets the logger threshold and environment-driven settings between tests
 * so a test that raises the log level or sets GITLAB_* variables does not
 * leak into the next one.
 */

import { afterEach, beforeEach, vi } from 'vitest';
import { setLogLevel } from './src/telemetry/logger.js';

beforeEach(() => {
  setLogLevel('info');
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
  vi.unstubAllGlobals();
});
