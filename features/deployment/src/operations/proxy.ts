/**
 * nginx site operations
 */

import type { RemoteOperation } from '@dockhand/shared';
import { NGINX_DEFAULT_SITE, NGINX_SITES_ENABLED } from '@dockhand/shared';
import { renderSiteConfig, siteAvailablePath, siteEnabledPath } from '../nginx.js';

const SITE_EOF = 'DOCKHAND_SITE_EOF';

export function listEnabledSites(): RemoteOperation {
  return {
    name: 'list_enabled_sites',
    description: 'List enabled nginx sites',
    severity: 'warning',
    idempotency: 'safe',
    script: `ls -1 ${NGINX_SITES_ENABLED}`,
  };
}

/** Replaces the site for this app and disables the default site */
export function activateSite(appName: string, appPort: number): RemoteOperation {
  return {
    name: 'activate_site',
    description: 'Write, enable and reload the nginx site',
    severity: 'fatal',
    idempotency: 'replace',
    script: [
      'set -e',
      'echo "Creating Nginx configuration..."',
      `sudo tee ${siteAvailablePath(appName)} > /dev/null <<'${SITE_EOF}'`,
      renderSiteConfig(appPort),
      SITE_EOF,
      'echo "Enabling site..."',
      `sudo ln -sf ${siteAvailablePath(appName)} ${siteEnabledPath(appName)}`,
      `sudo rm -f ${NGINX_SITES_ENABLED}/${NGINX_DEFAULT_SITE}`,
      'echo "Testing Nginx configuration..."',
      'sudo nginx -t',
      'echo "Reloading Nginx..."',
      'sudo systemctl reload nginx',
      'echo "Nginx configured successfully!"',
    ].join('\n'),
  };
}
