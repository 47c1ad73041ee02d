/**
 * @dockhand/deployment - Deployment Feature
 *
 * Clone, detect, provision, transfer, run, proxy, validate; and the reverse.
 */

export { DeployService, type DeployServiceDeps } from './deploy.service.js';
export { CleanupService, type CleanupServiceDeps } from './cleanup.service.js';
export { RepositoryService, type CloneResult } from './repository.service.js';
export { runPipeline, type PipelineStep, type PipelineRun, type StepReport } from './pipeline.js';
export { detectDeploymentType, type DetectionResult } from './detect.js';
export { deriveAppName, expandHome, buildAuthenticatedUrl, sshConfigFor } from './parameters.js';
export { renderSiteConfig, conflictingSites, siteAvailablePath, siteEnabledPath } from './nginx.js';
export { buildSummaryLines, sshCommand, logsCommand, cleanupCommand } from './summary.js';
export { LocalExec } from './local-exec.js';
export * from './operations/index.js';
export type {
  LoggerLike,
  DeployReporter,
  LocalRunner,
  LocalRunOptions,
  PipelineConfig,
} from './types.js';
export { silentReporter } from './types.js';
