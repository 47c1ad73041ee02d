/**
 * DeployService Tests
 */

import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { DeploymentParameters, StepOutcome } from '@dockhand/shared';
import { ConnectionError } from '@dockhand/shared';
import { DeployService } from '../deploy.service.js';
import type { DeployReporter, PipelineConfig } from '../types.js';
import { FakeGit, FakeRemote, MemoryLogger, result, type ScriptRule } from './fakes.js';

const params: DeploymentParameters = {
  repoUrl: 'https://example.com/org/app.git',
  token: 'test-token',
  branch: 'main',
  sshUser: 'deploy',
  serverAddress: '203.0.113.10',
  sshKeyPath: '/keys/id_test',
  appPort: 3000,
  appName: 'app',
};

const SITES_ONLY_DEFAULT: ScriptRule = ['ls -1 /etc/nginx/sites-enabled', { stdout: 'default\n' }];

describe('DeployService', () => {
  let workDir: string;
  let config: PipelineConfig;
  let logger: MemoryLogger;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'dockhand-deploy-'));
    config = { workDir, sshPort: 22, connectTimeoutMs: 10000, commandTimeoutMs: 60000, settleSeconds: 0 };
    logger = new MemoryLogger();
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  function service(git: FakeGit, remote: FakeRemote, reporter?: DeployReporter): DeployService {
    return new DeployService({ local: git, connect: remote.connect, logger, config, reporter });
  }

  it('should deploy a Dockerfile project as a named container behind nginx', async () => {
    const git = new FakeGit({ Dockerfile: 'FROM node:20\n' });
    const remote = new FakeRemote([SITES_ONLY_DEFAULT]);

    const deploy = await service(git, remote).execute(params);

    expect(deploy.success).toBe(true);
    expect(deploy.error).toBeUndefined();
    expect(deploy.accessUrl).toBe('http://203.0.113.10');
    expect(deploy.deploymentType).toBe('dockerfile');
    expect(deploy.steps.map((step) => [step.name, step.status])).toEqual([
      ['clone_repository', 'success'],
      ['detect_deployment_type', 'success'],
      ['test_connection', 'success'],
      ['provision_remote', 'success'],
      ['transfer_files', 'success'],
      ['deploy_application', 'success'],
      ['configure_proxy', 'success'],
      ['validate_deployment', 'success'],
    ]);

    expect(remote.scriptContaining('docker run')).toContain('docker run -d --name app -p 3000:3000 app:latest');
    expect(remote.scriptContaining('sudo tee')).toContain('proxy_pass http://localhost:3000;');
    expect(remote.scriptContaining('sudo tee')).toContain(
      'sudo ln -sf /etc/nginx/sites-available/app /etc/nginx/sites-enabled/app',
    );
    expect(remote.uploads).toEqual([
      { localDir: join(workDir, 'app'), remoteDir: 'deployments/app', exclude: ['.git'] },
    ]);
  });

  it('should open and close one session per remote step', async () => {
    const remote = new FakeRemote([SITES_ONLY_DEFAULT]);

    await service(new FakeGit({ Dockerfile: 'FROM node:20\n' }), remote).execute(params);

    expect(remote.sessions).toHaveLength(6);
    expect(remote.disconnects).toBe(6);
    expect(remote.sessions[0]).toEqual({
      config: { host: '203.0.113.10', port: 22, username: 'deploy', privateKeyPath: '/keys/id_test' },
      options: { readyTimeout: 10000 },
    });
  });

  it('should clone the requested branch with the token in the URL', async () => {
    const git = new FakeGit({ Dockerfile: 'FROM node:20\n' });

    await service(git, new FakeRemote([SITES_ONLY_DEFAULT])).execute({ ...params, branch: 'release' });

    expect(git.calls).toHaveLength(1);
    expect(git.calls[0].file).toBe('git');
    expect(git.calls[0].args).toEqual(['clone', '-b', 'release', 'https://test-token@example.com/org/app.git', 'app']);
    expect(git.calls[0].options?.cwd).toBe(workDir);
  });

  it('should replace a stale clone and report it as a warning', async () => {
    await mkdir(join(workDir, 'app'));
    await writeFile(join(workDir, 'app', 'stale.txt'), 'old');

    const deploy = await service(
      new FakeGit({ Dockerfile: 'FROM node:20\n' }),
      new FakeRemote([SITES_ONLY_DEFAULT]),
    ).execute(params);

    expect(deploy.success).toBe(true);
    expect(deploy.steps[0].status).toBe('warning');
    expect(deploy.steps[0].warnings).toEqual([`Removed existing local directory ${join(workDir, 'app')}`]);
    await expect(readFile(join(workDir, 'app', 'stale.txt'), 'utf-8')).rejects.toThrow();
  });

  it('should stop before any connection when the clone fails', async () => {
    const git = new FakeGit({}, result({
      code: 128,
      stderr: "fatal: Authentication failed for 'https://test-token@example.com/org/app.git/'\n",
    }));
    const remote = new FakeRemote();

    const deploy = await service(git, remote).execute(params);

    expect(deploy.success).toBe(false);
    expect(deploy.error).toBe('Failed to clone repository. Check the URL and your access token.');
    expect(deploy.steps[0].status).toBe('failed');
    expect(deploy.steps.slice(1).every((step) => step.status === 'skipped')).toBe(true);
    expect(remote.sessions).toHaveLength(0);
  });

  it('should never log the access token', async () => {
    const git = new FakeGit({}, result({
      code: 128,
      stderr: "fatal: Authentication failed for 'https://test-token@example.com/org/app.git/'\n",
    }));

    await service(git, new FakeRemote()).execute(params);

    expect(logger.text()).toContain("https://****@example.com/org/app.git/");
    expect(logger.text()).not.toContain('test-token');
  });

  it('should stop before any connection when no build descriptor exists', async () => {
    const remote = new FakeRemote();

    const deploy = await service(new FakeGit({ 'README.md': '# app\n' }), remote).execute(params);

    expect(deploy.success).toBe(false);
    expect(deploy.steps[1]).toMatchObject({
      name: 'detect_deployment_type',
      status: 'failed',
      error: `No Dockerfile or docker-compose.yml/docker-compose.yaml found in ${join(workDir, 'app')}`,
    });
    expect(remote.sessions).toHaveLength(0);
  });

  it('should fail the connection test when the host is unreachable', async () => {
    const remote = new FakeRemote();
    remote.connectError = new ConnectionError('203.0.113.10', 'Timed out while waiting for handshake');

    const deploy = await service(new FakeGit({ Dockerfile: 'FROM node:20\n' }), remote).execute(params);

    expect(deploy.success).toBe(false);
    expect(deploy.error).toBe('Failed to connect to 203.0.113.10: Timed out while waiting for handshake');
    expect(deploy.steps[2]).toMatchObject({ name: 'test_connection', status: 'failed' });
    expect(remote.sessions).toHaveLength(1);
  });

  it('should stop when provisioning fails', async () => {
    const remote = new FakeRemote([['apt-get update', { code: 100, stderr: 'E: Could not get lock\n' }]]);

    const deploy = await service(new FakeGit({ Dockerfile: 'FROM node:20\n' }), remote).execute(params);

    expect(deploy.success).toBe(false);
    expect(deploy.error).toBe("Remote operation 'install_packages' exited with code 100: E: Could not get lock");
    expect(deploy.steps[3].status).toBe('failed');
    expect(remote.uploads).toHaveLength(0);
    expect(remote.scriptContaining('docker run')).toBeUndefined();
  });

  it('should continue with a warning when the docker group change fails', async () => {
    const remote = new FakeRemote([SITES_ONLY_DEFAULT, ['usermod', { code: 1 }]]);

    const deploy = await service(new FakeGit({ Dockerfile: 'FROM node:20\n' }), remote).execute(params);

    expect(deploy.success).toBe(true);
    expect(deploy.steps[3].status).toBe('warning');
    expect(deploy.steps[3].warnings).toEqual([
      'Could not add deploy to the docker group (docker_group failed (exit code 1))',
    ]);
  });

  it('should warn about other enabled nginx sites', async () => {
    const remote = new FakeRemote([['ls -1 /etc/nginx/sites-enabled', { stdout: 'default\nblog\napp\n' }]]);

    const deploy = await service(new FakeGit({ Dockerfile: 'FROM node:20\n' }), remote).execute(params);

    expect(deploy.steps[6].status).toBe('warning');
    expect(deploy.steps[6].warnings).toEqual(['Other enabled nginx sites also listen on port 80: blog']);
  });

  it('should fail validation when the container is not running', async () => {
    const remote = new FakeRemote([SITES_ONLY_DEFAULT, ["grep -Fx app", { code: 1 }]]);

    const deploy = await service(new FakeGit({ Dockerfile: 'FROM node:20\n' }), remote).execute(params);

    expect(deploy.success).toBe(false);
    expect(deploy.steps[7]).toMatchObject({
      name: 'validate_deployment',
      status: 'failed',
      error: "Remote operation 'container_up' exited with code 1",
    });
  });

  it('should only warn when the HTTP check fails', async () => {
    const remote = new FakeRemote([SITES_ONLY_DEFAULT, ['curl', { code: 7 }]]);

    const deploy = await service(new FakeGit({ Dockerfile: 'FROM node:20\n' }), remote).execute(params);

    expect(deploy.success).toBe(true);
    expect(deploy.steps[7].warnings).toEqual(['http_check failed (exit code 7)']);
  });

  it('should only warn when the HTTP check times out', async () => {
    const remote = new FakeRemote([SITES_ONLY_DEFAULT, ['curl', new Error('Command timed out after 600000ms')]]);

    const deploy = await service(new FakeGit({ Dockerfile: 'FROM node:20\n' }), remote).execute(params);

    expect(deploy.success).toBe(true);
    expect(deploy.steps[7]).toMatchObject({ name: 'validate_deployment', status: 'warning' });
    expect(deploy.steps[7].warnings).toEqual(['http_check failed: Command timed out after 600000ms']);
  });

  it('should run the compose stack for a compose project', async () => {
    const remote = new FakeRemote([SITES_ONLY_DEFAULT, ["grep -i 'up'", { code: 1 }]]);

    const deploy = await service(new FakeGit({ 'docker-compose.yml': 'services: {}\n' }), remote).execute(params);

    expect(deploy.success).toBe(true);
    expect(deploy.deploymentType).toBe('compose');
    expect(remote.scriptContaining('docker-compose up -d --build')).toContain('cd ~/deployments/app');
    expect(remote.scriptContaining('docker run')).toBeUndefined();
    expect(deploy.steps[7].warnings).toEqual(['stack_up failed (exit code 1)']);
  });

  it('should report each step to the reporter', async () => {
    const events: string[] = [];
    const reporter: DeployReporter = {
      stage: (title) => events.push(`stage:${title}`),
      succeed: (outcome: StepOutcome) => events.push(`ok:${outcome.name}`),
      warn: (outcome: StepOutcome) => events.push(`warn:${outcome.name}`),
      fail: (outcome: StepOutcome) => events.push(`fail:${outcome.name}`),
    };
    const remote = new FakeRemote();
    remote.connectError = new ConnectionError('203.0.113.10', 'refused');

    await service(new FakeGit({ Dockerfile: 'FROM node:20\n' }), remote, reporter).execute(params);

    expect(events).toEqual([
      'stage:Cloning repository',
      'ok:clone_repository',
      'stage:Detecting deployment type',
      'ok:detect_deployment_type',
      'stage:Testing SSH connection',
      'fail:test_connection',
    ]);
  });
});
