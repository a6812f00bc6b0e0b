import { Command } from 'commander';
import { OutputRenderer } from '../output/renderer';
import type { CommandEnv, GlobalOptions } from '../context';

export function registerKillSessionCommand(program: Command, env: CommandEnv) {
  program
    .command('kill-session')
    .description('Kill the current session after switching to the last or previous one')
    .action(async () => {
      const renderer = new OutputRenderer(Boolean(program.opts<GlobalOptions>().json));
      const session = await env.services.sessions.killCurrentSession();
      renderer.render({ kind: 'session', action: 'killed', session });
    });
}
