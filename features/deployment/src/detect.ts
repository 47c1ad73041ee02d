/**
 * Deployment-type detection
 *
 * Dockerfile wins over a compose file when both are present.
 */

import { pathExists } from 'fs-extra';
import { join } from 'node:path';
import type { DeploymentType } from '@dockhand/shared';
import { COMPOSE_FILES, DOCKERFILE, StepFailedError } from '@dockhand/shared';

export interface DetectionResult {
  deploymentType: DeploymentType;
  descriptor: string;
}

export async function detectDeploymentType(projectPath: string): Promise<DetectionResult> {
  if (await pathExists(join(projectPath, DOCKERFILE))) {
    return { deploymentType: 'dockerfile', descriptor: DOCKERFILE };
  }

  for (const file of COMPOSE_FILES) {
    if (await pathExists(join(projectPath, file))) {
      return { deploymentType: 'compose', descriptor: file };
    }
  }

  throw new StepFailedError(
    'detect_deployment_type',
    `No ${DOCKERFILE} or ${COMPOSE_FILES.join('/')} found in ${projectPath}`,
  );
}
