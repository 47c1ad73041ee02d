/**
 * nginx reverse-proxy site rendering
 */

import { NGINX_SITES_AVAILABLE, NGINX_SITES_ENABLED, PROXY_PORT } from '@dockhand/shared';

export function siteAvailablePath(appName: string): string {
  return `${NGINX_SITES_AVAILABLE}/${appName}`;
}

export function siteEnabledPath(appName: string): string {
  return `${NGINX_SITES_ENABLED}/${appName}`;
}

/**
 * Site forwarding every path to the application's local port.
 * nginx variables are literal here; the file is written through a quoted heredoc.
 */
export function renderSiteConfig(appPort: number): string {
  return [
    'server {',
    `    listen ${PROXY_PORT};`,
    '    server_name _;',
    '',
    '    location / {',
    `        proxy_pass http://localhost:${appPort};`,
    '        proxy_http_version 1.1;',
    '        proxy_set_header Upgrade $http_upgrade;',
    "        proxy_set_header Connection 'upgrade';",
    '        proxy_set_header Host $host;',
    '        proxy_cache_bypass $http_upgrade;',
    '        proxy_set_header X-Real-IP $remote_addr;',
    '        proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;',
    '        proxy_set_header X-Forwarded-Proto $scheme;',
    '    }',
    '}',
  ].join('\n');
}

/** Enabled sites other than the default site and this application's own */
export function conflictingSites(enabled: readonly string[], appName: string): string[] {
  return enabled.filter((site) => site !== 'default' && site !== appName);
}
