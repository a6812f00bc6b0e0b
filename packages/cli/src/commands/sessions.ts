import { Command } from 'commander';
import { UsageError } from '@projpick/shared';
import { OutputRenderer } from '../output/renderer';
import type { CommandEnv, GlobalOptions } from '../context';

export function registerSessionsCommand(program: Command, env: CommandEnv) {
  program
    .command('sessions')
    .description('Pick one of the running sessions and switch to it')
    .action(async () => {
      const renderer = new OutputRenderer(Boolean(program.opts<GlobalOptions>().json));
      const { sessions, selector } = env.services;

      const targets = await sessions.listSessions();
      if (targets.length === 0) {
        throw new UsageError('No tmux sessions are running. Start one with `projpick start`.');
      }

      const current = await sessions.currentTarget().catch((error: unknown) => {
        env.logger.debug(
          `no current session: ${error instanceof Error ? error.message : String(error)}`,
        );
        return undefined;
      });
      const index = current === undefined ? -1 : targets.indexOf(current);

      const [target = ''] = await selector.select(targets, {
        header: 'Active sessions:',
        layout: 'reverse',
        preview: 'tmux capture-pane -ept {}',
        previewWindow: 'right:nohidden',
        initialPosition: Math.max(index, 0) + 1,
      });
      await sessions.switchTo(target);
      renderer.render({ kind: 'session', action: 'switched', session: target });
    });
}
