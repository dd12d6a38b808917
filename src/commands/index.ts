/**
 * Command exports
 */

export { createDefaultDependencies } from './command-factory';

export { ReportCommand } from './report/report-command';

export type { Command, CommandContext, CommandDependencies, CommandLogger } from './types';
export { BaseCommand } from './types';

export { ValidateCommand } from './validate/validate-command';
