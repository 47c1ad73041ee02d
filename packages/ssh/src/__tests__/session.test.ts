/**
 * Session Lifecycle Tests
 */

import type { SSHConfig } from '@dockhand/shared';
import { ConnectionError } from '@dockhand/shared';
import {
  RemoteSession,
  connectConfigFor,
  withSession,
  type RemoteConnector,
  type RemoteShell,
} from '../index.js';

const config: SSHConfig = {
  host: '203.0.113.10',
  port: 22,
  username: 'deploy',
  privateKeyPath: '/nonexistent/dockhand/id_test',
};

function fakeShell(): RemoteShell & { disconnect: jest.Mock } {
  return {
    host: config.host,
    exec: jest.fn(),
    runScript: jest.fn(),
    upload: jest.fn(),
    disconnect: jest.fn(),
  };
}

describe('RemoteSession', () => {
  it('should fail to connect when the private key does not exist', async () => {
    const session = new RemoteSession(config);

    await expect(session.connect()).rejects.toThrow(ConnectionError);
    await expect(session.connect()).rejects.toThrow(
      'Failed to connect to 203.0.113.10: SSH private key not found: /nonexistent/dockhand/id_test',
    );
  });

  it('should refuse to run commands before connecting', async () => {
    const session = new RemoteSession(config);
    await expect(session.exec('true')).rejects.toThrow('SSH not connected. Call connect() first.');
  });
});

describe('connectConfigFor', () => {
  const unreadableKey = Buffer.from('not a private key\n');

  it('should hand an unusable key over to the ssh-agent', () => {
    const connectConfig = connectConfigFor(config, unreadableKey, {
      agent: '/tmp/ssh-agent.sock',
      readyTimeout: 5000,
    });

    expect(connectConfig).toEqual({
      host: '203.0.113.10',
      port: 22,
      username: 'deploy',
      readyTimeout: 5000,
      agent: '/tmp/ssh-agent.sock',
    });
  });

  it('should take the agent socket from SSH_AUTH_SOCK by default', () => {
    const previous = process.env.SSH_AUTH_SOCK;
    process.env.SSH_AUTH_SOCK = '/tmp/env-agent.sock';
    try {
      expect(connectConfigFor(config, unreadableKey).agent).toBe('/tmp/env-agent.sock');
    } finally {
      if (previous === undefined) {
        delete process.env.SSH_AUTH_SOCK;
      } else {
        process.env.SSH_AUTH_SOCK = previous;
      }
    }
  });

  it('should reject an unusable key when no agent is available', () => {
    expect(() => connectConfigFor(config, unreadableKey, { agent: '' })).toThrow(ConnectionError);
    expect(() => connectConfigFor(config, unreadableKey, { agent: '' })).toThrow(
      /Cannot use SSH private key \/nonexistent\/dockhand\/id_test .* and no ssh-agent is available/,
    );
  });
});

describe('withSession', () => {
  it('should disconnect after the callback resolves', async () => {
    const shell = fakeShell();
    const connector: RemoteConnector = jest.fn(async () => shell);

    const result = await withSession(connector, config, async (s) => s.host, { readyTimeout: 5000 });

    expect(result).toBe('203.0.113.10');
    expect(connector).toHaveBeenCalledWith(config, { readyTimeout: 5000 });
    expect(shell.disconnect).toHaveBeenCalledTimes(1);
  });

  it('should disconnect when the callback throws', async () => {
    const shell = fakeShell();
    const connector: RemoteConnector = async () => shell;

    await expect(
      withSession(connector, config, async () => {
        throw new Error('step failed');
      }),
    ).rejects.toThrow('step failed');
    expect(shell.disconnect).toHaveBeenCalledTimes(1);
  });
});
