import { DeploymentQuerySchema } from '../schemas/deployment.js';
import type { Deployment, DeploymentQuery } from '../types/deployment.js';
import { getDeploymentStatus } from './stats.js';

/**
 * Parse a listing request (query string shape) into a DeploymentQuery.
 * Throws a ZodError on malformed input.
 */
export function parseDeploymentQuery(input: unknown): DeploymentQuery {
  return DeploymentQuerySchema.parse(input);
}

export function defaultDeploymentQuery(): DeploymentQuery {
  return parseDeploymentQuery({});
}

/**
 * Whether a deployment passes the filters of a query. Paging and sort are ignored.
 * Persistence layers that filter natively must select the same deployments.
 */
export function matchesQuery(deployment: Deployment, query: DeploymentQuery): boolean {
  if (query.searchText) {
    const needle = query.searchText.toLowerCase();
    const matched = deployment.name.toLowerCase().includes(needle)
      || deployment.artifactName.toLowerCase().includes(needle);
    if (!matched) {
      return false;
    }
  }

  if (query.type && (deployment.type ?? 'software') !== query.type) {
    return false;
  }

  const status = getDeploymentStatus(deployment);
  if (query.status === 'aborted') {
    if (status !== 'finished' || deployment.stats.aborted === 0) {
      return false;
    }
  } else if (query.status !== 'any' && status !== query.status) {
    return false;
  }

  const created = deployment.created.getTime();
  if (query.createdAfter && created < query.createdAfter.getTime()) {
    return false;
  }
  if (query.createdBefore && created > query.createdBefore.getTime()) {
    return false;
  }

  return true;
}
