import { Command } from 'commander';
import { logger as defaultLogger, UsageError, type ConsoleLogger } from '@projpick/shared';
import { version } from '../package.json';
import { createServices, resolveLogLevel, type GlobalOptions, type Services } from './context';
import { registerListCommand } from './commands/list';
import { registerNewSessionCommand } from './commands/new-session';
import { registerNewWindowCommand } from './commands/new-window';
import { registerSessionsCommand } from './commands/sessions';
import { registerKillSessionCommand } from './commands/kill-session';
import { registerStartCommand } from './commands/start';
import { registerDoctorCommand } from './commands/doctor';

export const name = '@projpick/cli';

export interface ProgramOptions {
  logger?: ConsoleLogger;
  services?: Services;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const logger = options.logger ?? defaultLogger;
  const env = { logger, services: options.services ?? createServices(logger) };
  const initialLevel = logger.getLevel();

  const program = new Command();

  program
    .name('projpick')
    .description('Pick projects from your directory trees and manage them as tmux sessions')
    .version(version)
    .option('-c, --config <path>', 'Path to configuration file')
    .option('--json', 'Output results as JSON')
    .option('--verbose', 'Enable verbose logging')
    .option('--log-level <level>', 'Log level: trace, debug, info, warn, error, silent')
    .action(() => {
      const [command] = program.args;
      if (command !== undefined) {
        throw new UsageError(`Unknown command "${command}". See "projpick --help".`);
      }
      program.outputHelp();
    });

  program.hook('preAction', () => {
    logger.setLevel(resolveLogLevel(program.opts<GlobalOptions>(), initialLevel));
  });

  registerListCommand(program, env);
  registerNewSessionCommand(program, env);
  registerNewWindowCommand(program, env);
  registerSessionsCommand(program, env);
  registerKillSessionCommand(program, env);
  registerStartCommand(program, env);
  registerDoctorCommand(program, env);

  return program;
}
