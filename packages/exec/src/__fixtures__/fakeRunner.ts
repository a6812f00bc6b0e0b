import { vi } from 'vitest';
import type { CommandRunner, RunOptions, RunResult } from '../runner/runner';

export function ok(stdout = ''): RunResult {
  return { exitCode: 0, stdout, stderr: '', failed: false };
}

export function exited(exitCode: number, stderr = ''): RunResult {
  return { exitCode, stdout: '', stderr, failed: true };
}

/**
 * Records every invocation and answers from a queue of results, `ok()` once
 * the queue runs dry.
 */
export class FakeRunner implements CommandRunner {
  /** Arguments of every call, interactive or not, in order */
  readonly calls: string[][] = [];

  readonly run = vi.fn(
    async (_file: string, args: readonly string[], _options?: RunOptions): Promise<RunResult> =>
      this.next(args),
  );

  readonly runInteractive = vi.fn(
    async (_file: string, args: readonly string[]): Promise<RunResult> => this.next(args),
  );

  private readonly queue: RunResult[] = [];

  respond(...results: RunResult[]): this {
    this.queue.push(...results);
    return this;
  }

  private next(args: readonly string[]): RunResult {
    this.calls.push([...args]);
    return this.queue.shift() ?? ok();
  }
}
