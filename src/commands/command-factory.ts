import { logger } from '@/utils/global-logger';

import type { CommandContext, CommandDependencies, CommandServiceOverrides } from './types';

/**
 * Default command dependencies: the global logger and the live process environment
 */
export function createDefaultDependencies(
  overrides?: Partial<CommandContext>,
  serviceOverrides?: CommandServiceOverrides,
): CommandDependencies {
  return {
    context: {
      logger: overrides?.logger ?? logger,
      cwd: overrides?.cwd ?? process.cwd(),
      env: overrides?.env ?? { ...process.env },
      stdin: overrides?.stdin ?? process.stdin,
    },
    ...(serviceOverrides !== undefined ? { services: serviceOverrides } : {}),
  };
}
