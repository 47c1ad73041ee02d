/**
 * @dockhand/shared - Deployment Types
 */

// ============================================================================
// Parameters
// ============================================================================

export type DeploymentType = 'dockerfile' | 'compose';

export interface DeploymentParameters {
  readonly repoUrl: string;
  readonly token: string;
  readonly branch: string;
  readonly sshUser: string;
  readonly serverAddress: string;
  readonly sshKeyPath: string;
  readonly appPort: number;
  readonly appName: string;
}

export interface DeploymentPlan {
  readonly params: DeploymentParameters;
  readonly deploymentType: DeploymentType;
  readonly projectPath: string;
  /** Relative to the remote user's home directory */
  readonly remoteDir: string;
  readonly imageName: string;
}

export interface CleanupTarget {
  readonly serverAddress: string;
  readonly sshUser: string;
  readonly sshKeyPath: string;
  readonly appName: string;
}

// ============================================================================
// Step Outcomes
// ============================================================================

export type StepName =
  | 'clone_repository'
  | 'detect_deployment_type'
  | 'test_connection'
  | 'provision_remote'
  | 'transfer_files'
  | 'deploy_application'
  | 'configure_proxy'
  | 'validate_deployment'
  | 'remote_cleanup'
  | 'local_cleanup';

export type StepStatus = 'success' | 'warning' | 'failed' | 'skipped';

export interface StepOutcome {
  name: StepName;
  title: string;
  status: StepStatus;
  duration: number;
  output?: string;
  error?: string;
  warnings: string[];
}

export interface DeployResult {
  success: boolean;
  appName: string;
  serverAddress: string;
  accessUrl: string;
  deploymentType?: DeploymentType;
  /** Present once the deployment type is known */
  plan?: DeploymentPlan;
  steps: StepOutcome[];
  duration: number;
  error?: string;
}

export interface CleanupResult {
  success: boolean;
  appName: string;
  serverAddress: string;
  steps: StepOutcome[];
  duration: number;
  error?: string;
}
