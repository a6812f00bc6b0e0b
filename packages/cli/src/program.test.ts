import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  ConfigError,
  ConsoleLogger,
  SelectionCancelledError,
  UsageError,
} from '@projpick/shared';
import { ProjectScanner } from '@projpick/scanner';
import { createProgram, name } from './program';
import { PROJECT_PICKER } from './commands/pick';
import type { Services } from './context';

function fakeServices() {
  return {
    scanner: { scanConfig: vi.fn(() => ['/srv/code', '/srv/code/app']) },
    selector: { select: vi.fn(async () => ['/srv/code/app']) },
    sessions: {
      openSession: vi.fn(async () => 'code/app'),
      openWindow: vi.fn(async () => 'code/app'),
      killCurrentSession: vi.fn(async () => 'work'),
      listSessions: vi.fn(async () => ['work:1', 'notes:2']),
      currentTarget: vi.fn(async () => 'notes:2'),
      switchTo: vi.fn(async () => undefined),
      runningSessions: vi.fn(async () => new Set<string>()),
      startSessions: vi.fn(async () => ({ started: ['work'], skipped: ['notes'] })),
      attach: vi.fn(async () => undefined),
      startDetached: vi.fn(async () => undefined),
    },
  } satisfies Services;
}

describe('projpick program', () => {
  let tmpDir: string;
  let configPath: string;
  let logger: ConsoleLogger;
  let services: ReturnType<typeof fakeServices>;
  let stdout: string[];
  let helpOutput: string[];

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'projpick-cli-test-'));
    configPath = path.join(tmpDir, 'config.json');
    logger = new ConsoleLogger({ level: 'silent' });
    services = fakeServices();
    stdout = [];
    helpOutput = [];
    vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
      stdout.push(String(line));
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function writeConfig(config: unknown) {
    await fs.writeFile(configPath, JSON.stringify(config));
  }

  async function run(args: string[], withServices: Services = services) {
    const program = createProgram({ logger, services: withServices });
    program.exitOverride();
    program.configureOutput({
      writeOut: (text) => helpOutput.push(text),
      writeErr: () => {},
    });
    await program.parseAsync(['node', 'projpick', ...args]);
  }

  it('exports the package name', () => {
    expect(name).toBe('@projpick/cli');
  });

  it('prints help without a subcommand', async () => {
    await run([]);

    expect(helpOutput.join('')).toContain('Usage: projpick [options] [command]');
    expect(services.selector.select).not.toHaveBeenCalled();
  });

  it('rejects an unknown command with a UsageError', async () => {
    await expect(run(['lsit'])).rejects.toThrow(
      new UsageError('Unknown command "lsit". See "projpick --help".'),
    );
    expect(helpOutput).toEqual([]);
    expect(services.scanner.scanConfig).not.toHaveBeenCalled();
  });

  describe('list', () => {
    it('prints one path per line', async () => {
      await writeConfig({ include: [{ paths: ['/srv/code'] }] });

      await run(['-c', configPath, 'list']);

      expect(stdout).toEqual(['/srv/code', '/srv/code/app']);
      expect(services.scanner.scanConfig).toHaveBeenCalledWith(
        expect.objectContaining({ include: [expect.objectContaining({ paths: ['/srv/code'] })] }),
      );
    });

    it('prints a JSON array with --json', async () => {
      await writeConfig({});

      await run(['--json', '-c', configPath, 'list']);

      expect(stdout).toEqual([JSON.stringify(['/srv/code', '/srv/code/app'], null, 2)]);
    });

    it('scans the configured trees', async () => {
      await fs.mkdir(path.join(tmpDir, 'code', 'app', '.git'), { recursive: true });
      await fs.mkdir(path.join(tmpDir, 'code', 'notes'), { recursive: true });
      await writeConfig({
        markers: { exact: ['.git'], chainRootMarkers: true },
        include: [{ paths: [path.join(tmpDir, 'code')] }],
      });

      await run(['-c', configPath, 'list'], {
        ...services,
        scanner: new ProjectScanner({ logger }),
      });

      expect(stdout).toEqual([path.join(tmpDir, 'code'), path.join(tmpDir, 'code', 'app')]);
    });

    it('fails on a missing explicit config file', async () => {
      await expect(run(['-c', path.join(tmpDir, 'missing.json'), 'list'])).rejects.toThrow(
        ConfigError,
      );
      expect(services.scanner.scanConfig).not.toHaveBeenCalled();
    });

    it('fails on an invalid config before scanning', async () => {
      await writeConfig({ depth: 300 });

      await expect(run(['-c', configPath, 'list'])).rejects.toThrow(ConfigError);
      expect(services.scanner.scanConfig).not.toHaveBeenCalled();
    });
  });

  describe('new-session', () => {
    it('opens the picked project as a session', async () => {
      await writeConfig({});

      await run(['-c', configPath, 'new-session']);

      expect(services.selector.select).toHaveBeenCalledWith(
        ['/srv/code', '/srv/code/app'],
        PROJECT_PICKER,
      );
      expect(services.sessions.openSession).toHaveBeenCalledWith('/srv/code/app');
      expect(stdout).toHaveLength(1);
      expect(stdout[0]).toContain('code/app');
    });

    it('opens the picked line unchanged', async () => {
      await writeConfig({});
      services.selector.select.mockResolvedValueOnce([' /srv/code/notes ']);

      await run(['-c', configPath, 'new-session']);

      expect(services.sessions.openSession).toHaveBeenCalledWith(' /srv/code/notes ');
    });

    it('propagates a cancelled pick without touching tmux', async () => {
      await writeConfig({});
      services.selector.select.mockRejectedValueOnce(new SelectionCancelledError());

      await expect(run(['-c', configPath, 'new-session'])).rejects.toBeInstanceOf(
        SelectionCancelledError,
      );
      expect(services.sessions.openSession).not.toHaveBeenCalled();
    });
  });

  it.each(['new-window', 'new-pane'])('%s opens the picked project as a window', async (command) => {
    await writeConfig({});

    await run(['--json', '-c', configPath, command]);

    expect(services.sessions.openWindow).toHaveBeenCalledWith('/srv/code/app');
    expect(stdout).toEqual([
      JSON.stringify({ window: 'code/app', path: '/srv/code/app' }, null, 2),
    ]);
  });

  describe('sessions', () => {
    it('starts the cursor on the current session and switches to the pick', async () => {
      services.selector.select.mockResolvedValueOnce(['work:1']);

      await run(['sessions']);

      expect(services.selector.select).toHaveBeenCalledWith(['work:1', 'notes:2'], {
        header: 'Active sessions:',
        layout: 'reverse',
        preview: 'tmux capture-pane -ept {}',
        previewWindow: 'right:nohidden',
        initialPosition: 2,
      });
      expect(services.sessions.switchTo).toHaveBeenCalledWith('work:1');
    });

    it('starts on the first entry outside tmux', async () => {
      services.sessions.currentTarget.mockRejectedValueOnce(new Error('no current client'));

      await run(['sessions']);

      expect(services.selector.select).toHaveBeenCalledWith(
        ['work:1', 'notes:2'],
        expect.objectContaining({ initialPosition: 1 }),
      );
    });

    it('fails when no session is running', async () => {
      services.sessions.listSessions.mockResolvedValueOnce([]);

      await expect(run(['sessions'])).rejects.toThrow(UsageError);
      expect(services.selector.select).not.toHaveBeenCalled();
    });
  });

  it('kill-session reports the killed session', async () => {
    await run(['--json', 'kill-session']);

    expect(services.sessions.killCurrentSession).toHaveBeenCalledTimes(1);
    expect(stdout).toEqual([JSON.stringify({ action: 'killed', session: 'work' }, null, 2)]);
  });

  describe('start', () => {
    const sessions = [
      { name: 'work', windows: ['/srv/code/api'] },
      { name: 'notes', windows: [] },
    ];

    it('starts the picked sessions', async () => {
      await writeConfig({ sessions });
      services.selector.select.mockResolvedValueOnce(['work']);

      await run(['--json', '-c', configPath, 'start']);

      expect(services.selector.select).toHaveBeenCalledWith(
        ['work', 'notes'],
        expect.objectContaining({ header: 'Start sessions:', multi: true }),
      );
      expect(services.sessions.startSessions).toHaveBeenCalledWith([sessions[0]], new Set());
      expect(services.sessions.attach).not.toHaveBeenCalled();
      expect(stdout).toEqual([JSON.stringify({ started: ['work'], skipped: ['notes'] }, null, 2)]);
    });

    it('attaches afterwards with --attach', async () => {
      await writeConfig({ sessions });

      await run(['-c', configPath, 'start', '--attach']);

      expect(services.sessions.attach).toHaveBeenCalledWith();
    });

    it('starts a plain session when none are configured', async () => {
      await writeConfig({});

      await run(['-c', configPath, 'start']);
      await run(['-c', configPath, 'start', '-a']);

      expect(services.sessions.startDetached).toHaveBeenCalledTimes(1);
      expect(services.sessions.attach).toHaveBeenCalledWith({ fresh: true });
      expect(services.selector.select).not.toHaveBeenCalled();
    });
  });

  describe('logging options', () => {
    it('--verbose lowers the level to debug', async () => {
      await writeConfig({});

      await run(['--verbose', '-c', configPath, 'list']);

      expect(logger.getLevel()).toBe('debug');
    });

    it('--log-level sets any level', async () => {
      await writeConfig({});

      await run(['--log-level', 'trace', '-c', configPath, 'list']);

      expect(logger.getLevel()).toBe('trace');
    });

    it('rejects an unknown level', async () => {
      await expect(run(['--log-level', 'loud', 'list'])).rejects.toThrow(UsageError);
    });
  });
});
