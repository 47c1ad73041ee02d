/**
 * @dockhand/shared - Constants
 */

export const CLI_NAME = 'dockhand';

// Parameter defaults
export const DEFAULT_BRANCH = 'main';
export const DEFAULT_SSH_KEY_PATH = '~/.ssh/id_rsa';

// Build descriptors, checked in this order
export const DOCKERFILE = 'Dockerfile';
export const COMPOSE_FILES = ['docker-compose.yml', 'docker-compose.yaml'] as const;

// Local files never transferred to the remote host
export const TRANSFER_EXCLUDES = ['.git'] as const;

// Remote layout
export const REMOTE_DEPLOY_ROOT = 'deployments';
export const NGINX_SITES_AVAILABLE = '/etc/nginx/sites-available';
export const NGINX_SITES_ENABLED = '/etc/nginx/sites-enabled';
export const NGINX_DEFAULT_SITE = 'default';
export const PROXY_PORT = 80;

// Container names, nginx site names and directories are all derived from this
export const APP_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export { getVersion } from './version.js';
