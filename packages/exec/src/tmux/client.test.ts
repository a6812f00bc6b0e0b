import { describe, it, expect, beforeEach } from 'vitest';
import { ConsoleLogger, ProcessError } from '@projpick/shared';
import { FakeRunner, exited, ok } from '../__fixtures__/fakeRunner';
import { TmuxClient } from './client';

describe('TmuxClient', () => {
  let runner: FakeRunner;
  let tmux: TmuxClient;

  beforeEach(() => {
    runner = new FakeRunner();
    tmux = new TmuxClient({ runner, logger: new ConsoleLogger({ level: 'silent' }) });
  });

  it('checks for a session by exact name', async () => {
    runner.respond(ok(), exited(1));

    await expect(tmux.hasSession('code/app')).resolves.toBe(true);
    await expect(tmux.hasSession('code/web')).resolves.toBe(false);
    expect(runner.calls[0]).toEqual(['has-session', '-t', '=code/app']);
  });

  it('creates a detached session without taking the terminal', async () => {
    await tmux.newSession({
      session: 'code/app',
      window: 'code/app',
      cwd: '/home/alice/code/app',
      detached: true,
    });

    expect(runner.run).toHaveBeenCalledWith('tmux', [
      'new-session',
      '-d',
      '-s',
      'code/app',
      '-n',
      'code/app',
      '-c',
      '/home/alice/code/app',
    ]);
    expect(runner.runInteractive).not.toHaveBeenCalled();
  });

  it('creates an attached session interactively', async () => {
    await tmux.newSession({});

    expect(runner.runInteractive).toHaveBeenCalledWith('tmux', ['new-session']);
  });

  it('adds a window to a named session', async () => {
    await tmux.newWindow({ name: 'code/web', cwd: '/srv/code/web', session: 'work', detached: true });

    expect(runner.calls).toEqual([
      ['new-window', '-d', '-t', 'work:', '-n', 'code/web', '-c', '/srv/code/web'],
    ]);
  });

  it('reports whether there was a session to switch to', async () => {
    runner.respond(exited(1, 'no last session'), ok());

    await expect(tmux.switchClientTo('last')).resolves.toBe(false);
    await expect(tmux.switchClientTo('previous')).resolves.toBe(true);
    expect(runner.calls).toEqual([
      ['switch-client', '-l'],
      ['switch-client', '-p'],
    ]);
  });

  it('trims display output', async () => {
    runner.respond(ok('work:2\n'));

    await expect(tmux.display('#S:#I')).resolves.toBe('work:2');
    expect(runner.calls[0]).toEqual(['display-message', '-p', '#S:#I']);
  });

  it('parses the session list', async () => {
    runner.respond(ok('work:1,$3\nnotes:2,$0\n'));

    await expect(tmux.listSessions()).resolves.toEqual([
      { target: 'work:1', id: 3 },
      { target: 'notes:2', id: 0 },
    ]);
  });

  it('returns no sessions when no server is running', async () => {
    runner.respond(exited(1, 'no server running'), exited(1, 'no server running'));

    await expect(tmux.listSessions()).resolves.toEqual([]);
    await expect(tmux.listSessionNames()).resolves.toEqual([]);
  });

  it('fails with the stderr of a failed command', async () => {
    runner.respond(exited(1, "can't find session: nope\n"));

    await expect(tmux.killSession('nope')).rejects.toMatchObject({
      message: "tmux kill-session exited with code 1: can't find session: nope",
      exitCode: 1,
    });
  });

  it('fails when tmux cannot be started', async () => {
    runner.respond({ exitCode: undefined, stdout: '', stderr: '', failed: true });

    await expect(tmux.hasSession('x')).rejects.toThrow(ProcessError);
  });

  it('attaches with the terminal handed over', async () => {
    await tmux.attach('work');

    expect(runner.runInteractive).toHaveBeenCalledWith('tmux', ['attach-session', '-t', 'work']);
  });
});
