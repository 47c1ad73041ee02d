export { checkConnectivity, installPackages, addUserToDockerGroup, remoteDeployDir } from './provision.js';
export { composeDeploy, dockerfileDeploy, deployApplication } from './deploy.js';
export { listEnabledSites, activateSite } from './proxy.js';
export { serviceActive, containersUp, httpCheck, validationChecks } from './validate.js';
export { cleanupOperations } from './cleanup.js';
export { runOperation, failedCheckWarning, type RunOperationOptions } from './runner.js';
