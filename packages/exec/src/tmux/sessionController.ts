import {
  expandPath,
  logger as defaultLogger,
  type Logger,
  type SessionDefinition,
} from '@projpick/shared';
import { TmuxClient } from './client';
import { paneName, sessionName } from './naming';

export interface SessionControllerOptions {
  tmux?: TmuxClient;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

export interface StartReport {
  started: string[];
  /** Requested sessions that were already running */
  skipped: string[];
}

/**
 * The tmux workflows behind the picker's commands.
 */
export class SessionController {
  private readonly tmux: TmuxClient;
  private readonly logger: Logger;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: SessionControllerOptions = {}) {
    this.logger = (options.logger ?? defaultLogger).child({ scope: 'sessions' });
    this.tmux = options.tmux ?? new TmuxClient({ logger: options.logger });
    this.env = options.env ?? process.env;
  }

  /** True when running inside a tmux client. */
  get insideTmux(): boolean {
    return Boolean(this.env.TMUX);
  }

  /**
   * Opens `path` as its own session, reusing one of the same name, and moves
   * the client there. Returns the session name.
   */
  async openSession(path: string): Promise<string> {
    const pane = paneName(path);
    const session = sessionName(pane);

    if (await this.tmux.hasSession(session)) {
      this.logger.info(`session ${session} exists, switching to it`);
    } else {
      await this.tmux.newSession({ session, window: pane, cwd: path, detached: true });
    }

    if (this.insideTmux) {
      await this.tmux.switchClient(session);
    } else {
      await this.tmux.attach(session);
    }
    return session;
  }

  /** Opens `path` in a new window of the current session. Returns the window name. */
  async openWindow(path: string): Promise<string> {
    const pane = paneName(path);
    await this.tmux.newWindow({ name: pane, cwd: path });
    return pane;
  }

  /**
   * Kills the current session after moving the client to the last session,
   * or the previous one when there is no last. Returns the killed name.
   */
  async killCurrentSession(): Promise<string> {
    const current = await this.tmux.display('#S');
    if (!(await this.tmux.switchClientTo('last'))) {
      this.logger.debug('no last session, switching to previous');
      await this.tmux.switchClientTo('previous');
    }
    await this.tmux.killSession(current);
    return current;
  }

  /** Session targets (`name:window`) ordered by session id. */
  async listSessions(): Promise<string[]> {
    const sessions = await this.tmux.listSessions();
    return [...sessions].sort((a, b) => a.id - b.id).map((session) => session.target);
  }

  /** `name:window` of the current client. */
  async currentTarget(): Promise<string> {
    return this.tmux.display('#S:#I');
  }

  async switchTo(target: string): Promise<void> {
    await this.tmux.switchClient(target);
  }

  async runningSessions(): Promise<Set<string>> {
    return new Set(await this.tmux.listSessionNames());
  }

  /**
   * Creates each predefined session that is not running yet. The first window
   * opens in the first listed directory (`$HOME` when none), the rest follow
   * in order.
   */
  async startSessions(
    sessions: readonly SessionDefinition[],
    existing: ReadonlySet<string>,
  ): Promise<StartReport> {
    const report: StartReport = { started: [], skipped: [] };

    for (const definition of sessions) {
      if (existing.has(definition.name)) {
        report.skipped.push(definition.name);
        continue;
      }

      const [first = '$HOME', ...rest] = definition.windows;
      const firstDir = expandPath(first, this.env);
      await this.tmux.newSession({
        session: definition.name,
        window: paneName(firstDir),
        cwd: firstDir,
        detached: true,
      });

      for (const window of rest) {
        const dir = expandPath(window, this.env);
        await this.tmux.newWindow({
          name: paneName(dir),
          cwd: dir,
          session: definition.name,
          detached: true,
        });
      }
      await this.tmux.renumberWindows(definition.name);

      this.logger.debug(`started ${definition.name} with ${definition.windows.length || 1} windows`);
      report.started.push(definition.name);
    }
    return report;
  }

  /**
   * Hands the terminal to tmux. Without predefined sessions to attach to,
   * starts a fresh one.
   */
  async attach(options: { fresh?: boolean } = {}): Promise<void> {
    if (options.fresh) {
      await this.tmux.newSession({});
    } else {
      await this.tmux.attach();
    }
  }

  /** Starts a plain session in the background. */
  async startDetached(): Promise<void> {
    await this.tmux.newSession({ detached: true });
  }
}
