/**
 * Deploy Mode Tests
 */

import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { CommandResult } from '@dockhand/shared';
import type { LocalRunner } from '@dockhand/deployment';
import type { RemoteConnector, RemoteShell } from '@dockhand/ssh';
import { runDeploy } from '../commands/deploy.cmd.js';
import { runCleanup } from '../commands/cleanup.cmd.js';
import type { Prompter } from '../lib/prompts.js';

const ok = (stdout = ''): CommandResult => ({ stdout, stderr: '', code: 0, duration: 1 });

function prompterWith(answers: string[]): Prompter {
  const next = async () => answers.shift() ?? '';
  return { text: next, password: next };
}

function healthyConnector(): jest.Mock<ReturnType<RemoteConnector>, Parameters<RemoteConnector>> {
  const shell: RemoteShell = {
    host: '203.0.113.10',
    exec: async () => ok(),
    runScript: async (script) => ok(script.startsWith('ls -1') ? 'default\n' : ''),
    upload: async () => ({ directories: 0, files: 1, links: 0, bytes: 14 }),
    disconnect: () => undefined,
  };
  return jest.fn<ReturnType<RemoteConnector>, Parameters<RemoteConnector>>(async () => shell);
}

const cloneWithDockerfile: LocalRunner = {
  run: async (_file, args, options) => {
    const target = join(options?.cwd ?? '.', args[args.length - 1]);
    await mkdir(target, { recursive: true });
    await writeFile(join(target, 'Dockerfile'), 'FROM node:20\n');
    return ok();
  },
};

async function readRunLog(dir: string, mode: string): Promise<string> {
  const files = (await readdir(dir)).filter((name) => name.startsWith(`${mode}_`) && name.endsWith('.log'));
  expect(files).toHaveLength(1);
  return readFile(join(dir, files[0]), 'utf-8');
}

describe('runDeploy', () => {
  let dir: string;
  let env: NodeJS.ProcessEnv;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'dockhand-cli-'));
    env = { DOCKHAND_LOG_DIR: dir, DOCKHAND_WORKDIR: dir, DOCKHAND_SETTLE_SECONDS: '0', LOG_LEVEL: 'error' };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should fail before connecting when a parameter is empty', async () => {
    const connect = healthyConnector();

    const code = await runDeploy({ env, prompter: prompterWith(['']), connect, interactive: false });

    expect(code).toBe(1);
    expect(connect).not.toHaveBeenCalled();
    expect(await readRunLog(dir, 'deploy')).toMatch(/\[ERROR\] Git repository URL cannot be empty\n$/);
  });

  it('should deploy and write the summary to the run log without the token', async () => {
    const code = await runDeploy({
      env,
      prompter: prompterWith([
        'https://example.com/org/app.git',
        'test-token',
        'main',
        'deploy',
        '203.0.113.10',
        '/keys/id_test',
        '3000',
      ]),
      connect: healthyConnector(),
      local: cloneWithDockerfile,
      interactive: false,
      collect: { keyExists: async () => true },
    });

    expect(code).toBe(0);
    const log = await readRunLog(dir, 'deploy');
    expect(log).toContain('[DEBUG] Access your application at: http://203.0.113.10\n');
    expect(log).toContain('[INFO] Application name: app\n');
    expect(log).not.toContain('test-token');
  });
});

describe('runCleanup', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'dockhand-cli-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should clean up using flags only and log to a cleanup file', async () => {
    const connect = healthyConnector();

    const code = await runCleanup(
      { app: 'app', server: '203.0.113.10', user: 'deploy', key: '/keys/id_test' },
      {
        env: { DOCKHAND_LOG_DIR: dir, DOCKHAND_WORKDIR: dir, LOG_LEVEL: 'error' },
        prompter: prompterWith([]),
        connect,
        interactive: false,
        collect: { keyExists: async () => true },
      },
    );

    expect(code).toBe(0);
    expect(connect).toHaveBeenCalledTimes(1);
    expect(await readRunLog(dir, 'cleanup')).toContain('[INFO] Cleanup of app on 203.0.113.10 completed\n');
  });
});
