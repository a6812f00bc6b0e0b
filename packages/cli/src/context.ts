import type { Command } from 'commander';
import {
  ConfigLoader,
  expandPath,
  isLogLevel,
  LOG_LEVELS,
  UsageError,
  type Config,
  type ConsoleLogger,
  type LogLevel,
} from '@projpick/shared';
import { FzfSelector, SessionController, type Selector } from '@projpick/exec';
import { ProjectScanner } from '@projpick/scanner';
import { OutputRenderer } from './output/renderer';

export interface GlobalOptions {
  config?: string;
  json?: boolean;
  verbose?: boolean;
  logLevel?: string;
}

export type SessionsApi = Pick<
  SessionController,
  | 'openSession'
  | 'openWindow'
  | 'killCurrentSession'
  | 'listSessions'
  | 'currentTarget'
  | 'switchTo'
  | 'runningSessions'
  | 'startSessions'
  | 'attach'
  | 'startDetached'
>;

/**
 * The collaborators commands drive. Swapped for fakes in tests.
 */
export interface Services {
  scanner: Pick<ProjectScanner, 'scanConfig'>;
  selector: Selector;
  sessions: SessionsApi;
}

export function createServices(logger: ConsoleLogger): Services {
  return {
    scanner: new ProjectScanner({ logger }),
    selector: new FzfSelector({ logger }),
    sessions: new SessionController({ logger }),
  };
}

export interface CommandContext {
  config: Config;
  /** File the configuration came from; undefined when defaults were used */
  configSource: string | undefined;
  renderer: OutputRenderer;
  options: GlobalOptions;
}

export function resolveLogLevel(options: GlobalOptions, fallback: LogLevel): LogLevel {
  if (options.logLevel !== undefined) {
    if (!isLogLevel(options.logLevel)) {
      throw new UsageError(
        `Invalid --log-level "${options.logLevel}". Must be one of ${LOG_LEVELS.join(', ')}.`,
      );
    }
    return options.logLevel;
  }
  return options.verbose ? 'debug' : fallback;
}

export function loadContext(program: Command, logger: ConsoleLogger): CommandContext {
  const options = program.opts<GlobalOptions>();
  const { config, source } = ConfigLoader.load({
    configPath: options.config === undefined ? undefined : expandPath(options.config),
    logger,
  });
  return {
    config,
    configSource: source,
    renderer: new OutputRenderer(Boolean(options.json)),
    options,
  };
}

/** What every register*Command function receives besides the program. */
export interface CommandEnv {
  services: Services;
  logger: ConsoleLogger;
}
