import type { Deployment, DeploymentStats, DeploymentView } from '../types/deployment.js';
import { getDeploymentStatus } from './stats.js';

/**
 * External representation of a deployment.
 *
 * Targeting inputs (devices, allDevices, deviceList) and raw counters stay
 * internal. Records without a type read as software deployments.
 */
export function toDeploymentView(deployment: Deployment): DeploymentView {
  const view: DeploymentView = {
    id: deployment.id,
    name: deployment.name,
    artifactName: deployment.artifactName,
    created: deployment.created.toISOString(),
    status: getDeploymentStatus(deployment),
    deviceCount: deployment.deviceCount,
    type: deployment.type ?? 'software',
  };

  if (deployment.finished) {
    view.finished = deployment.finished.toISOString();
  }
  if (deployment.maxDevices > 0) {
    view.maxDevices = deployment.maxDevices;
  }
  if (deployment.artifacts.length > 0) {
    view.artifacts = [...deployment.artifacts];
  }
  if (deployment.configuration && deployment.configuration.length > 0) {
    view.configuration = Buffer.from(deployment.configuration).toString('base64');
  }

  return view;
}

export function toDeploymentStatsView(deployment: Deployment): DeploymentStats {
  return { ...deployment.stats };
}
