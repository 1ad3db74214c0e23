/**
 * ARN parsing
 * arn:partition:service:region:account-id:resource
 */

export interface ArnComponents {
  partition: string;
  service: string;
  /** Empty for global services such as S3 */
  region: string;
  accountId: string;
  resourceType: string;
  resourceId: string;
}

const SUPPORTED_PARTITIONS = new Set(['aws', 'aws-cn', 'aws-us-gov']);
const ISOLATED_PARTITIONS = new Set(['aws-iso', 'aws-iso-b']);

// (service, resource type) pairs that price as a different resource type
const EC2_RESOURCE_TYPES: Record<string, string> = {
  volume: 'ebs',
  'natgateway': 'natgw',
  vpc: 'vpc',
  subnet: 'subnet',
  'security-group': 'securitygroup',
};

const SERVICE_TYPES: Record<string, string> = {
  elasticloadbalancing: 'elb',
  logs: 'cloudwatch',
};

export function parseArn(arn: string): ArnComponents {
  if (arn === '') {
    throw new Error('ARN is empty');
  }

  const parts = splitN(arn, ':', 6);
  if (parts.length < 6) {
    throw new Error(`invalid ARN format: expected at least 6 colon-separated parts, got ${parts.length}`);
  }

  const [prefix, partition, service, region, accountId, resourcePart] = parts;
  if (prefix !== 'arn') {
    throw new Error(`invalid ARN: must start with 'arn:', got "${prefix}"`);
  }
  if (partition === '') {
    throw new Error('invalid ARN: partition is empty');
  }
  if (!SUPPORTED_PARTITIONS.has(partition)) {
    if (ISOLATED_PARTITIONS.has(partition)) {
      throw new Error(
        `unsupported ARN partition "${partition}": isolated partitions (aws-iso, aws-iso-b) do not have public pricing data available`,
      );
    }
    throw new Error(`invalid ARN partition: "${partition}"`);
  }
  if (service === '') {
    throw new Error('invalid ARN: service is empty');
  }
  if (resourcePart === '') {
    throw new Error('invalid ARN: resource part is empty');
  }

  const [resourceType, resourceId] = splitResourcePart(resourcePart);
  return { partition, service, region, accountId, resourceType, resourceId };
}

/**
 * Canonical resource type an ARN's service and resource map onto
 */
export function arnResourceType(components: ArnComponents): string {
  if (components.service === 'ec2') {
    return EC2_RESOURCE_TYPES[components.resourceType.toLowerCase()] ?? 'ec2';
  }
  return SERVICE_TYPES[components.service] ?? components.service;
}

// Resource type ends at the first "/" or ":", whichever comes first
function splitResourcePart(resourcePart: string): [string, string] {
  const index = resourcePart.search(/[/:]/);
  if (index === -1) return [resourcePart, ''];
  return [resourcePart.slice(0, index), resourcePart.slice(index + 1)];
}

function splitN(value: string, separator: string, limit: number): string[] {
  const parts: string[] = [];
  let rest = value;
  while (parts.length < limit - 1) {
    const index = rest.indexOf(separator);
    if (index === -1) break;
    parts.push(rest.slice(0, index));
    rest = rest.slice(index + 1);
  }
  parts.push(rest);
  return parts;
}
