/**
 * Supports
 * Answers whether this engine can price a resource, without pricing it
 */

import { AWS_PROVIDER } from './request-validator';
import { isGlobalService, resolveResourceType } from './resource-resolver';
import type { ImpactMetricKind, ResourceDescriptor, SupportsResult } from './types';

const SUPPORTED_SERVICES = new Set([
  'ec2', 'rds', 'lambda', 's3', 'ebs', 'eks', 'dynamodb', 'elasticache', 'elb', 'natgw', 'cloudwatch',
]);

// Services with a carbon estimate alongside the cost
const CARBON_SERVICES = new Set(['ec2', 'elasticache']);

function unsupported(reason: string): SupportsResult {
  return { supported: false, reason, supportedMetrics: [] };
}

export function supportedMetrics(serviceCode: string): ImpactMetricKind[] {
  return CARBON_SERVICES.has(serviceCode) ? ['carbon_footprint'] : [];
}

/**
 * Check provider, region and resource type. Never throws.
 */
export function checkSupport(resource: ResourceDescriptor | undefined, engineRegion: string): SupportsResult {
  if (!resource) {
    return unsupported('Invalid request: missing resource descriptor');
  }
  if (resource.provider !== AWS_PROVIDER) {
    return unsupported(`Provider "${resource.provider}" not supported (only "${AWS_PROVIDER}" is supported)`);
  }

  const { serviceCode } = resolveResourceType(resource.resourceType);
  const region = resource.region === '' && isGlobalService(serviceCode) ? engineRegion : resource.region;
  if (region !== engineRegion) {
    return unsupported(
      `Region not supported by this binary (plugin region: ${engineRegion}, resource region: ${resource.region})`,
    );
  }

  if (!SUPPORTED_SERVICES.has(serviceCode)) {
    return unsupported(`Resource type "${resource.resourceType}" not supported`);
  }

  return { supported: true, reason: '', supportedMetrics: supportedMetrics(serviceCode) };
}
