import type { PullRequestGateway, PullRequestTarget } from '@/core/pull-request/interfaces';
import type { FileSource } from '@/io/file-source';
import type { Logger } from '@/utils/logger';

/**
 * Base command interface that all commands must implement
 */
export type Command<TOptions = unknown> = {
  readonly description: string;

  /**
   * Execute the command with given options
   * Returns exit code (0 for success, non-zero for failure)
   */
  execute(options: TOptions): Promise<number>;

  readonly name: string;
};

export type CommandLogger = Pick<Logger, 'debug' | 'error' | 'info' | 'raw' | 'warn'>;

/**
 * Command context with shared dependencies
 */
export type CommandContext = {
  /** Current working directory */
  cwd: string;
  /** Environment captured at start-up */
  env: Record<string, string | undefined>;
  logger: CommandLogger;
  stdin?: NodeJS.ReadableStream;
};

/**
 * Optional service overrides for commands (primarily for testing)
 */
export type CommandServiceOverrides = {
  createFileSource?: (rootDir: string) => FileSource;
  createGateway?: (target: PullRequestTarget) => PullRequestGateway;
};

/**
 * Command dependencies for dependency injection
 */
export type CommandDependencies = {
  context: CommandContext;
  services?: CommandServiceOverrides;
};

/**
 * Abstract base class for commands
 */
export abstract class BaseCommand<TOptions = unknown> implements Command<TOptions> {
  constructor(
    public readonly name: string,
    public readonly description: string,
    protected readonly dependencies: CommandDependencies,
  ) {}

  abstract execute(options: TOptions): Promise<number>;

  protected get logger(): CommandLogger {
    return this.dependencies.context.logger;
  }

  protected get context(): CommandContext {
    return this.dependencies.context;
  }

  protected get cwd(): CommandContext['cwd'] {
    return this.dependencies.context.cwd;
  }
}
