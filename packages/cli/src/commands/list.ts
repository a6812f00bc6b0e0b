import { Command } from 'commander';
import { loadContext, type CommandEnv } from '../context';

export function registerListCommand(program: Command, env: CommandEnv) {
  program
    .command('list')
    .description('Print every path the picker would offer, one per line')
    .action(() => {
      const { config, renderer } = loadContext(program, env.logger);
      const paths = env.services.scanner.scanConfig(config);
      renderer.render({ kind: 'paths', paths });
    });
}
