import { Command, CommanderError } from 'commander';
import { ZodError } from 'zod';

import {
  type CommandContext,
  createDefaultDependencies,
  ReportCommand,
  ValidateCommand,
} from './commands';
import type { CommandServiceOverrides } from './commands/types';
import { ExitCode } from './core/exit-codes';
import { validateReportArgs, validateValidateArgs } from './types/cli';
import { GlobalLogger, logger } from './utils/global-logger';

export type CliOverrides = {
  context?: Partial<CommandContext>;
  services?: CommandServiceOverrides;
};

/**
 * Add common options to a command (shared across all commands)
 */
function addCommonOptions(command: Command): Command {
  return command
    .option('-v, --verbose', 'Verbose output', false)
    .option('-s, --silent', 'Silent mode - suppress all output', false);
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Build the CLI program. `onExit` receives the exit code of whichever command ran.
 */
export function createProgram(
  onExit: (exitCode: number) => void,
  overrides: CliOverrides = {},
): Command {
  const program = new Command();

  program
    .name('localegate')
    .description('Validate JSON locale files and gate pull requests on the result')
    .version('0.1.0')
    .exitOverride();

  // Validate command
  addCommonOptions(
    program
      .command('validate')
      .description('Validate candidate JSON files and write a report')
      .argument('[files...]', 'Files to validate (default: --files-from or $CHANGED_FILES)')
      .option('--files-from <file>', "Read the candidate list from a file ('-' for stdin)")
      .option('-o, --output <file>', 'Where to write the JSON report')
      .option('-c, --config <file>', 'Configuration file (default: localegate.config.yaml)')
      .option('--encoding <label>', 'Expected text encoding')
      .option('--max-file-size <bytes>', 'Largest accepted file size in bytes')
      .option('-p, --parallelism <count>', 'Number of files checked concurrently')
      .option('--timeout <ms>', 'Overall deadline for the run in milliseconds')
      .option('--target-path <prefix>', 'Only validate files under this path')
      .option('--root-dir <dir>', 'Directory candidate paths are relative to')
      .option('--allow-any-extension', 'Validate files without a .json extension', false),
  ).action(async (files: string[] | undefined, options: Record<string, unknown>) => {
    const validatedOptions = validateValidateArgs({ ...options, files });
    GlobalLogger.configure({
      verbose: validatedOptions.verbose,
      silent: validatedOptions.silent,
    });
    const deps = createDefaultDependencies({ logger, ...overrides.context }, overrides.services);
    const command = new ValidateCommand(deps);
    onExit(await command.execute(validatedOptions));
  });

  // Report command
  addCommonOptions(
    program
      .command('report')
      .description('Render a validation report and post it to a pull request')
      .option('-i, --input <file>', 'Validation report to read (default: the configured results file)')
      .option('-c, --config <file>', 'Configuration file (default: localegate.config.yaml)')
      .option('--pr <number>', 'Pull request to comment on and label (default: print to stdout)')
      .option('--repo <owner/name>', 'Repository of the pull request'),
  ).action(async (options: Record<string, unknown>) => {
    const validatedOptions = validateReportArgs(options);
    // The rendered comment goes to stdout, so diagnostics move to stderr
    GlobalLogger.configure({
      verbose: validatedOptions.verbose,
      silent: validatedOptions.silent,
      stream: 'stderr',
    });
    const deps = createDefaultDependencies({ logger, ...overrides.context }, overrides.services);
    const command = new ReportCommand(deps);
    onExit(await command.execute(validatedOptions));
  });

  return program;
}

export async function run(argv: readonly string[], overrides: CliOverrides = {}): Promise<number> {
  let exitCode: number = ExitCode.SUCCESS;
  const program = createProgram((code) => {
    exitCode = code;
  }, overrides);

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help and version output exit with 0; usage errors were already printed
      return error.exitCode === 0 ? ExitCode.SUCCESS : ExitCode.INTERNAL_ERROR;
    }
    if (error instanceof ZodError) {
      logger.error(`Invalid options: ${formatZodError(error)}`);
      return ExitCode.INTERNAL_ERROR;
    }
    const message = error instanceof Error ? error.message : 'Unknown error';
    logger.error(message);
    return ExitCode.INTERNAL_ERROR;
  }
}
