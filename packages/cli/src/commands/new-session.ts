import { Command } from 'commander';
import type { CommandEnv } from '../context';
import { pickProject } from './pick';

export function registerNewSessionCommand(program: Command, env: CommandEnv) {
  program
    .command('new-session')
    .description('Pick a project and open it as a tmux session')
    .action(async () => {
      const { context, path } = await pickProject(program, env);
      const session = await env.services.sessions.openSession(path);
      context.renderer.render({ kind: 'session', action: 'opened', session });
    });
}
