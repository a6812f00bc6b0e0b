import {
  logger as defaultLogger,
  ProcessError,
  SelectionCancelledError,
  type Logger,
} from '@projpick/shared';
import { ExecaRunner, type CommandRunner } from '../runner/runner';

export interface SelectOptions {
  header: string;
  /** Allow picking several entries */
  multi?: boolean;
  layout?: 'default' | 'reverse' | 'reverse-list';
  /** Preview command; fzf substitutes `{}` with the current line */
  preview?: string;
  previewWindow?: string;
  /** 1-based line the cursor starts on */
  initialPosition?: number;
}

export interface Selector {
  select(items: readonly string[], options: SelectOptions): Promise<string[]>;
}

// fzf: 1 = no match, 130 = interrupted (Esc / Ctrl-C), 2 = error
const CANCEL_EXIT_CODES = new Set([1, 130]);

export function fzfArgs(options: SelectOptions): string[] {
  const args: string[] = [];
  if (options.multi) args.push('-m');
  if (options.layout) args.push('--layout', options.layout);
  if (options.preview) args.push('--preview', options.preview);
  if (options.previewWindow) args.push('--preview-window', options.previewWindow);
  if (options.initialPosition !== undefined) {
    args.push('--sync', '--bind', `load:pos(${options.initialPosition})`);
  }
  args.push('--header', options.header);
  return args;
}

export interface FzfSelectorOptions {
  runner?: CommandRunner;
  logger?: Logger;
  /** Executable to run, `fzf` on PATH by default */
  binary?: string;
}

export class FzfSelector implements Selector {
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly binary: string;

  constructor(options: FzfSelectorOptions = {}) {
    this.runner = options.runner ?? new ExecaRunner();
    this.logger = (options.logger ?? defaultLogger).child({ scope: 'fzf' });
    this.binary = options.binary ?? 'fzf';
  }

  /**
   * Presents `items` and resolves to the picked lines.
   *
   * @throws SelectionCancelledError when nothing was picked
   * @throws ProcessError when fzf cannot be started or reports an error
   */
  async select(items: readonly string[], options: SelectOptions): Promise<string[]> {
    const args = fzfArgs(options);
    this.logger.debug(`${this.binary} ${args.join(' ')} (${items.length} items)`);

    const result = await this.runner.run(this.binary, args, {
      input: items.join('\n'),
      inheritStderr: true,
    });

    if (result.exitCode === undefined) {
      throw new ProcessError(`Failed to start ${this.binary}; is it installed and on PATH?`);
    }
    if (CANCEL_EXIT_CODES.has(result.exitCode)) {
      throw new SelectionCancelledError();
    }
    if (result.exitCode !== 0) {
      throw new ProcessError(`${this.binary} exited with code ${result.exitCode}`, {
        exitCode: result.exitCode,
      });
    }

    const picked = result.stdout.split('\n').filter((line) => line.length > 0);
    if (picked.length === 0) {
      throw new SelectionCancelledError();
    }
    this.logger.trace(`picked ${picked.join(', ')}`);
    return picked;
  }
}
