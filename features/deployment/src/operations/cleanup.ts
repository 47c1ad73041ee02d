/**
 * Teardown operations. Every one tolerates missing resources.
 */

import type { RemoteOperation } from '@dockhand/shared';
import { NGINX_DEFAULT_SITE, NGINX_SITES_AVAILABLE, NGINX_SITES_ENABLED } from '@dockhand/shared';
import { siteAvailablePath, siteEnabledPath } from '../nginx.js';
import { remoteDeployDir } from './provision.js';

function destructive(name: string, description: string, script: string): RemoteOperation {
  return { name, description, severity: 'warning', idempotency: 'destructive', script };
}

export function cleanupOperations(appName: string): RemoteOperation[] {
  const remoteDir = `~/${remoteDeployDir(appName)}`;
  const image = `${appName.toLowerCase()}:latest`;

  return [
    destructive(
      'stop_container',
      'Stop and remove the application container',
      `docker stop ${appName} 2>/dev/null || true\ndocker rm ${appName} 2>/dev/null || true`,
    ),
    destructive(
      'compose_down',
      'Tear down the compose stack with its volumes',
      [
        `if [ -d ${remoteDir} ] && { [ -f ${remoteDir}/docker-compose.yml ] || [ -f ${remoteDir}/docker-compose.yaml ]; }; then`,
        `  cd ${remoteDir} && docker-compose down -v --rmi local || true`,
        'fi',
      ].join('\n'),
    ),
    destructive(
      'remove_image',
      'Remove the application image',
      `docker rmi ${image} 2>/dev/null || true\ndocker image prune -f || true`,
    ),
    destructive('remove_files', 'Delete the remote deployment directory', `rm -rf ${remoteDir}`),
    destructive(
      'remove_proxy_site',
      'Remove the nginx site',
      `sudo rm -f ${siteEnabledPath(appName)} ${siteAvailablePath(appName)}`,
    ),
    destructive(
      'restore_default_site',
      'Re-enable the default nginx site when nothing else is enabled',
      [
        `if [ -z "$(ls -A ${NGINX_SITES_ENABLED} 2>/dev/null)" ] && [ -f ${NGINX_SITES_AVAILABLE}/${NGINX_DEFAULT_SITE} ]; then`,
        `  sudo ln -sf ${NGINX_SITES_AVAILABLE}/${NGINX_DEFAULT_SITE} ${NGINX_SITES_ENABLED}/${NGINX_DEFAULT_SITE}`,
        '  echo "Default site restored"',
        'fi',
      ].join('\n'),
    ),
    destructive('reload_proxy', 'Validate and reload nginx', '(sudo nginx -t && sudo systemctl reload nginx) || true'),
    destructive('prune_runtime', 'Prune unused docker resources', 'docker system prune -f || true'),
  ];
}
