/**
 * Remote provisioning operations
 */

import type { RemoteOperation } from '@dockhand/shared';
import { REMOTE_DEPLOY_ROOT } from '@dockhand/shared';

export function checkConnectivity(): RemoteOperation {
  return {
    name: 'check_connection',
    description: 'Check the host accepts a session',
    severity: 'fatal',
    idempotency: 'safe',
    script: "echo 'SSH connection successful'",
  };
}

/** Installs only what is missing; services are (re)started and enabled every time */
export function installPackages(): RemoteOperation {
  return {
    name: 'install_packages',
    description: 'Install docker, docker-compose and nginx',
    severity: 'fatal',
    idempotency: 'safe',
    script: [
      'set -e',
      'echo "Updating system packages..."',
      'sudo apt-get update -y',
      'echo "Installing Docker..."',
      'if ! command -v docker >/dev/null 2>&1; then',
      '  sudo apt-get install -y docker.io',
      'fi',
      'sudo systemctl start docker',
      'sudo systemctl enable docker',
      'echo "Installing Docker Compose..."',
      'if ! command -v docker-compose >/dev/null 2>&1; then',
      '  sudo apt-get install -y docker-compose',
      'fi',
      'echo "Installing Nginx..."',
      'if ! command -v nginx >/dev/null 2>&1; then',
      '  sudo apt-get install -y nginx',
      'fi',
      'sudo systemctl start nginx',
      'sudo systemctl enable nginx',
      'echo "Verifying installations..."',
      'docker --version',
      'docker-compose --version',
      'nginx -v',
      'echo "Remote environment ready!"',
    ].join('\n'),
  };
}

export function addUserToDockerGroup(): RemoteOperation {
  return {
    name: 'docker_group',
    description: 'Add the remote user to the docker group',
    severity: 'warning',
    idempotency: 'safe',
    script: 'sudo usermod -aG docker "$USER"',
  };
}

export function remoteDeployDir(appName: string): string {
  return `${REMOTE_DEPLOY_ROOT}/${appName}`;
}
