/**
 * Build/run operations, one per deployment type
 */

import type { DeploymentPlan, RemoteOperation } from '@dockhand/shared';

export function composeDeploy(plan: DeploymentPlan, settleSeconds: number): RemoteOperation {
  return {
    name: 'compose_up',
    description: 'Rebuild and start the compose stack',
    severity: 'fatal',
    idempotency: 'replace',
    script: [
      'set -e',
      `cd ~/${plan.remoteDir}`,
      'echo "Stopping existing containers..."',
      'docker-compose down --rmi local || true',
      'echo "Building and starting containers..."',
      'docker-compose up -d --build',
      'echo "Waiting for containers to settle..."',
      `sleep ${settleSeconds}`,
      'echo "Container status:"',
      'docker-compose ps',
      'echo "Cleaning up unused resources..."',
      'docker image prune -f || true',
    ].join('\n'),
  };
}

export function dockerfileDeploy(plan: DeploymentPlan, settleSeconds: number): RemoteOperation {
  const { appName, appPort } = plan.params;
  const image = `${plan.imageName}:latest`;
  return {
    name: 'docker_run',
    description: 'Build the image and run a fresh container',
    severity: 'fatal',
    idempotency: 'replace',
    script: [
      'set -e',
      `cd ~/${plan.remoteDir}`,
      'echo "Stopping existing container..."',
      `docker stop ${appName} 2>/dev/null || true`,
      `docker rm ${appName} 2>/dev/null || true`,
      'echo "Removing old image..."',
      `docker rmi ${image} 2>/dev/null || true`,
      'echo "Building Docker image..."',
      `docker build -t ${image} .`,
      'echo "Running container..."',
      `docker run -d --name ${appName} -p ${appPort}:${appPort} ${image}`,
      'echo "Waiting for container to start..."',
      `sleep ${settleSeconds}`,
      'echo "Container status:"',
      `docker ps -f name=${appName}`,
      'echo "Cleaning up unused resources..."',
      'docker image prune -f || true',
    ].join('\n'),
  };
}

export function deployApplication(plan: DeploymentPlan, settleSeconds: number): RemoteOperation {
  return plan.deploymentType === 'compose'
    ? composeDeploy(plan, settleSeconds)
    : dockerfileDeploy(plan, settleSeconds);
}
