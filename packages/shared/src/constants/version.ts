/**
 * @dockhand/shared - Version (from the VERSION file at the repository root)
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';

export function getVersion(): string {
  // Environment variable override (for packaged builds, CI, etc.)
  if (process.env.DOCKHAND_VERSION) {
    return process.env.DOCKHAND_VERSION;
  }

  const candidates = [
    join(__dirname, '..', '..', '..', '..', 'VERSION'),
    join(process.cwd(), 'VERSION'),
  ];

  for (const p of candidates) {
    try {
      if (existsSync(p)) {
        return readFileSync(p, 'utf-8').trim();
      }
    } catch {
      continue;
    }
  }

  return '0.0.0';
}
