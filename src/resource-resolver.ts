/**
 * Resource Identity Resolver
 * Maps raw resource-type strings (canonical short forms such as "ec2" or
 * vendor-hierarchical forms such as "aws:ec2/instance:Instance") onto the
 * service that prices them.
 */

import type { ResourceIdentity, ServiceIdentifier } from './types';

const SERVICE_BY_CODE: Record<string, ServiceIdentifier> = {
  ec2: 'compute-instance',
  ebs: 'block-volume',
  rds: 'relational-db',
  eks: 'managed-k8s',
  s3: 'object-storage',
  lambda: 'function',
  dynamodb: 'kv-table',
  elb: 'load-balancer',
  natgw: 'nat-gateway',
  cloudwatch: 'log-metric-service',
  elasticache: 'cache-cluster',
  vpc: 'no-charge',
  securitygroup: 'no-charge',
  subnet: 'no-charge',
  iam: 'no-charge',
};

const CANONICAL_CODES = new Set([
  'ec2', 'ebs', 'rds', 's3', 'lambda', 'dynamodb', 'eks', 'elb', 'natgw', 'cloudwatch', 'elasticache',
]);

const ZERO_COST_CODES = new Set(['vpc', 'securitygroup', 'subnet', 'iam']);

// Module segment of a vendor type -> service code
const MODULE_ALIASES: Record<string, string> = {
  ec2: 'ec2',
  ebs: 'ebs',
  rds: 'rds',
  s3: 's3',
  lambda: 'lambda',
  dynamodb: 'dynamodb',
  eks: 'eks',
  natgw: 'natgw',
  cloudwatch: 'cloudwatch',
  elasticache: 'elasticache',
  lb: 'elb',
  alb: 'elb',
  nlb: 'elb',
  natgateway: 'natgw',
};

const ZERO_COST_PATTERNS: Array<[prefix: string, code: string]> = [
  ['aws:ec2/vpc', 'vpc'],
  ['aws:ec2/securitygroup', 'securitygroup'],
  ['aws:ec2/subnet', 'subnet'],
];

// Substring fallbacks for types that are neither canonical nor parsed above
const SERVICE_PATTERNS: Array<[patterns: string[], code: string]> = [
  [['ec2/instance'], 'ec2'],
  [['ebs/volume', 'ec2/volume'], 'ebs'],
  [['rds/instance'], 'rds'],
  [['eks/cluster'], 'eks'],
  [['s3/bucket'], 's3'],
  [['lambda/function'], 'lambda'],
  [['dynamodb/table'], 'dynamodb'],
  [['lb/loadbalancer', 'alb/loadbalancer', 'nlb/loadbalancer'], 'elb'],
  [['ec2/natgateway'], 'natgw'],
  [['cloudwatch/loggroup', 'cloudwatch/logstream', 'cloudwatch/metricalarm'], 'cloudwatch'],
  [['elasticache/'], 'elasticache'],
  [['iam/'], 'iam'],
];

/**
 * Normalize a resource type to its canonical short form where one is known.
 * Unrecognized vendor types come back unchanged; other input is lowercased.
 */
export function normalizeResourceType(resourceType: string): string {
  const lowered = resourceType.toLowerCase();
  if (!lowered.startsWith('aws:')) {
    return lowered;
  }

  if (lowered.includes('ec2/volume')) return 'ebs';
  if (lowered.includes('ec2/natgateway')) return 'natgw';
  if (lowered.startsWith('aws:iam/')) return 'iam';

  for (const [prefix, code] of ZERO_COST_PATTERNS) {
    if (lowered === prefix || lowered.startsWith(`${prefix}:`)) {
      return code;
    }
  }

  const rest = lowered.slice('aws:'.length);
  const moduleName = rest.split('/')[0].split(':')[0];
  const alias = MODULE_ALIASES[moduleName];
  if (alias) {
    return alias;
  }

  return resourceType;
}

/**
 * Detect the service code for a normalized resource type
 */
export function detectService(resourceType: string): string {
  const lowered = resourceType.toLowerCase();

  if (CANONICAL_CODES.has(lowered) || ZERO_COST_CODES.has(lowered)) {
    return lowered;
  }
  if (lowered === 'alb' || lowered === 'nlb') {
    return 'elb';
  }

  for (const [patterns, code] of SERVICE_PATTERNS) {
    if (patterns.some(pattern => lowered.includes(pattern))) {
      return code;
    }
  }

  return resourceType;
}

export function toServiceIdentifier(serviceCode: string): ServiceIdentifier {
  return SERVICE_BY_CODE[serviceCode] ?? 'unknown';
}

/**
 * Resolve a raw resource type in one pass
 */
export function resolveResourceType(resourceType: string): ResourceIdentity {
  const normalizedType = normalizeResourceType(resourceType);
  const serviceCode = detectService(normalizedType);
  return {
    normalizedType,
    serviceCode,
    service: toServiceIdentifier(serviceCode),
  };
}

/**
 * Services priced globally rather than per region
 */
export function isGlobalService(serviceCode: string): boolean {
  return serviceCode === 's3' || serviceCode === 'iam';
}

/**
 * Memoizes resolutions for the lifetime of one request
 */
export class ResolutionCache {
  private readonly entries = new Map<string, ResourceIdentity>();

  resolve(resourceType: string): ResourceIdentity {
    const cached = this.entries.get(resourceType);
    if (cached) {
      return cached;
    }
    const identity = resolveResourceType(resourceType);
    this.entries.set(resourceType, identity);
    return identity;
  }

  get size(): number {
    return this.entries.size;
  }
}
