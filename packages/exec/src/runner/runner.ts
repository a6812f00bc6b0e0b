import { execa } from 'execa';

export interface RunOptions {
  /** Written to the child's stdin */
  input?: string;
  /** Let the child draw on the terminal through stderr instead of capturing it */
  inheritStderr?: boolean;
}

export interface RunResult {
  /** Undefined when the process could not be started or was killed by a signal */
  exitCode: number | undefined;
  stdout: string;
  stderr: string;
  /** True when the process could not be started or exited non-zero */
  failed: boolean;
}

/**
 * Runs external programs with argument arrays; nothing goes through a shell.
 * Non-zero exits are reported in the result rather than thrown.
 */
export interface CommandRunner {
  run(file: string, args: readonly string[], options?: RunOptions): Promise<RunResult>;
  /** Runs with the terminal handed over (stdin, stdout and stderr inherited). */
  runInteractive(file: string, args: readonly string[]): Promise<RunResult>;
}

export class ExecaRunner implements CommandRunner {
  async run(file: string, args: readonly string[], options: RunOptions = {}): Promise<RunResult> {
    if (options.inheritStderr) {
      const result = await execa(file, args, {
        input: options.input,
        stderr: 'inherit',
        reject: false,
      });
      return { exitCode: result.exitCode, stdout: result.stdout, stderr: '', failed: result.failed };
    }

    const result = await execa(file, args, { input: options.input, reject: false });
    return {
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
      failed: result.failed,
    };
  }

  async runInteractive(file: string, args: readonly string[]): Promise<RunResult> {
    const result = await execa(file, args, { stdio: 'inherit', reject: false });
    return { exitCode: result.exitCode, stdout: '', stderr: '', failed: result.failed };
  }
}
