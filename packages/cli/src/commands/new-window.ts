import { Command } from 'commander';
import type { CommandEnv } from '../context';
import { pickProject } from './pick';

export function registerNewWindowCommand(program: Command, env: CommandEnv) {
  program
    .command('new-window')
    .alias('new-pane')
    .description('Pick a project and open it in a new window of the current session')
    .action(async () => {
      const { context, path } = await pickProject(program, env);
      const window = await env.services.sessions.openWindow(path);
      context.renderer.render({ kind: 'window', window, path });
    });
}
