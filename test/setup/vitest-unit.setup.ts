import chalk from 'chalk';
import { afterEach, vi } from 'vitest';

import { GlobalLogger } from '@/utils/global-logger';

// Unit test setup - fast, isolated tests against in-memory fakes

// Plain strings so assertions do not depend on the terminal
chalk.level = 0;

GlobalLogger.configure({ silent: true });

vi.spyOn(process, 'exit').mockImplementation(() => {
  throw new Error('process.exit() called');
});

afterEach(() => {
  GlobalLogger.reset();
  GlobalLogger.configure({ silent: true });
});

// Per-project timeout is configured in vitest.config.ts (projects.unit.testTimeout)
