import { Command } from 'commander';
import type { SessionDefinition } from '@projpick/shared';
import { loadContext, type CommandEnv } from '../context';

interface StartOptions {
  attach?: boolean;
}

/** One line per session for the selector preview, quoted for `sh -c`. */
export function sessionPreview(sessions: readonly SessionDefinition[]): string {
  const text = sessions
    .map((session) => `${session.name}: ${session.windows.join(', ') || '$HOME'}`)
    .join('\n');
  return `echo '${text.replaceAll("'", `'\\''`)}'`;
}

export function registerStartCommand(program: Command, env: CommandEnv) {
  program
    .command('start')
    .description('Start predefined tmux sessions')
    .option('-a, --attach', 'Attach to tmux once the sessions are started')
    .action(async (options: StartOptions) => {
      const { config, renderer } = loadContext(program, env.logger);
      const { sessions, selector } = env.services;

      if (config.sessions.length === 0) {
        env.logger.info('No predefined sessions, starting a plain one');
        if (options.attach) {
          await sessions.attach({ fresh: true });
        } else {
          await sessions.startDetached();
        }
        return;
      }

      const picked = new Set(
        await selector.select(
          config.sessions.map((session) => session.name),
          {
            header: 'Start sessions:',
            multi: true,
            layout: 'reverse',
            preview: sessionPreview(config.sessions),
            previewWindow: 'right:nohidden',
          },
        ),
      );

      const requested = config.sessions.filter((session) => picked.has(session.name));
      const report = await sessions.startSessions(requested, await sessions.runningSessions());
      renderer.render({ kind: 'start', ...report });

      if (options.attach) {
        await sessions.attach();
      }
    });
}
