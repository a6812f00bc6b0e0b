import { logger as defaultLogger, ProcessError, type Logger } from '@projpick/shared';
import { ExecaRunner, type CommandRunner, type RunResult } from '../runner/runner';

export interface TmuxSession {
  /** `#S:#I`, the session name and its active window */
  target: string;
  /** Numeric part of `#{session_id}` ($3 → 3) */
  id: number;
}

export interface NewSessionOptions {
  session?: string;
  window?: string;
  cwd?: string;
  /** Create without attaching; the only way outside a terminal */
  detached?: boolean;
}

export interface NewWindowOptions {
  name: string;
  cwd: string;
  /** Session to add the window to; the current one when unset */
  session?: string;
  /** Keep the current window focused */
  detached?: boolean;
}

export interface TmuxClientOptions {
  runner?: CommandRunner;
  logger?: Logger;
  binary?: string;
}

const SESSION_LIST_FORMAT = '#S:#I,#{session_id}';

/**
 * Thin wrapper over individual tmux commands.
 */
export class TmuxClient {
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly binary: string;

  constructor(options: TmuxClientOptions = {}) {
    this.runner = options.runner ?? new ExecaRunner();
    this.logger = (options.logger ?? defaultLogger).child({ scope: 'tmux' });
    this.binary = options.binary ?? 'tmux';
  }

  async hasSession(session: string): Promise<boolean> {
    const result = await this.exec(['has-session', '-t', `=${session}`]);
    return result.exitCode === 0;
  }

  async newSession(options: NewSessionOptions): Promise<void> {
    const args = ['new-session'];
    if (options.detached) args.push('-d');
    if (options.session) args.push('-s', options.session);
    if (options.window) args.push('-n', options.window);
    if (options.cwd) args.push('-c', options.cwd);

    if (options.detached) {
      await this.check(args);
    } else {
      await this.interactive(args);
    }
  }

  async newWindow(options: NewWindowOptions): Promise<void> {
    const args = ['new-window'];
    if (options.detached) args.push('-d');
    if (options.session) args.push('-t', `${options.session}:`);
    args.push('-n', options.name, '-c', options.cwd);
    await this.check(args);
  }

  async renumberWindows(session: string): Promise<void> {
    await this.check(['move-window', '-r', '-t', session]);
  }

  async switchClient(target: string): Promise<void> {
    await this.check(['switch-client', '-t', target]);
  }

  /**
   * Switches to the last (`-l`) or previous (`-p`) session.
   * Resolves false when there is none to switch to.
   */
  async switchClientTo(which: 'last' | 'previous'): Promise<boolean> {
    const result = await this.exec(['switch-client', which === 'last' ? '-l' : '-p']);
    return result.exitCode === 0;
  }

  async killSession(session: string): Promise<void> {
    await this.check(['kill-session', '-t', `=${session}`]);
  }

  async attach(session?: string): Promise<void> {
    const args = ['attach-session'];
    if (session) args.push('-t', session);
    await this.interactive(args);
  }

  /** Expands a tmux format in the context of the current client. */
  async display(format: string): Promise<string> {
    const result = await this.check(['display-message', '-p', format]);
    return result.stdout.trim();
  }

  async listSessionNames(): Promise<string[]> {
    const result = await this.exec(['list-sessions', '-F', '#S']);
    // No server running means no sessions.
    if (result.exitCode !== 0) return [];
    return splitLines(result.stdout);
  }

  async listSessions(): Promise<TmuxSession[]> {
    const result = await this.exec(['list-sessions', '-F', SESSION_LIST_FORMAT]);
    if (result.exitCode !== 0) return [];

    return splitLines(result.stdout).map((line) => {
      const comma = line.lastIndexOf(',');
      if (comma === -1) {
        throw new ProcessError(`Unexpected list-sessions line: ${line}`);
      }
      return {
        target: line.slice(0, comma),
        id: Number.parseInt(line.slice(comma + 1).replace(/^\$/, ''), 10),
      };
    });
  }

  private async exec(args: string[]): Promise<RunResult> {
    this.logger.debug(`${this.binary} ${args.join(' ')}`);
    const result = await this.runner.run(this.binary, args);
    if (result.exitCode === undefined) {
      throw new ProcessError(`Failed to start ${this.binary}; is it installed and on PATH?`);
    }
    return result;
  }

  private async check(args: string[]): Promise<RunResult> {
    const result = await this.exec(args);
    if (result.exitCode !== 0) {
      throw commandFailed(this.binary, args, result);
    }
    return result;
  }

  private async interactive(args: string[]): Promise<void> {
    this.logger.debug(`${this.binary} ${args.join(' ')} (interactive)`);
    const result = await this.runner.runInteractive(this.binary, args);
    if (result.exitCode !== 0) {
      throw commandFailed(this.binary, args, result);
    }
  }
}

function commandFailed(binary: string, args: string[], result: RunResult): ProcessError {
  const reason = result.stderr.trim();
  const status = result.exitCode === undefined ? 'could not run' : `exited with code ${result.exitCode}`;
  return new ProcessError(`${binary} ${args[0] ?? ''} ${status}${reason ? `: ${reason}` : ''}`, {
    exitCode: result.exitCode,
    details: { args },
  });
}

function splitLines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
