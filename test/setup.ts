/**
 * Test Setup
 *
 * Environment defaults for every test file, set at module level so they are
 * in place before any module under test is imported. Individual tests that
 * read settings override what they need and restore it afterwards.
 */

process.env['NODE_ENV'] = 'test';
// Keep test output readable; tests asserting on log entries raise the level themselves
process.env['LOG_LEVEL'] = 'fatal';
// No test talks to a real Redis
delete process.env['REDIS_URL'];
delete process.env['EXPERIMENTS_DISABLED'];

import { afterEach } from 'vitest';

import { resetLogHandlers } from '../packages/kernel/logger';
import { resetMetricHandlers } from '../packages/kernel/metrics';

afterEach(() => {
  resetLogHandlers();
  resetMetricHandlers();
});
