import { describe, it, expect } from 'vitest';
import { checkSupport } from './supports';
import type { ResourceDescriptor } from './types';

function resource(overrides: Partial<ResourceDescriptor> = {}): ResourceDescriptor {
  return { provider: 'aws', resourceType: 'ec2', sku: 't3.micro', region: 'us-east-1', tags: {}, ...overrides };
}

describe('checkSupport', () => {
  it('supports EC2 with carbon metrics', () => {
    expect(checkSupport(resource(), 'us-east-1')).toEqual({
      supported: true,
      reason: '',
      supportedMetrics: ['carbon_footprint'],
    });
  });

  it('supports vendor-hierarchical types without metrics', () => {
    expect(checkSupport(resource({ resourceType: 'aws:rds/instance:Instance' }), 'us-east-1')).toEqual({
      supported: true,
      reason: '',
      supportedMetrics: [],
    });
  });

  it('explains a missing descriptor', () => {
    expect(checkSupport(undefined, 'us-east-1')).toEqual({
      supported: false,
      reason: 'Invalid request: missing resource descriptor',
      supportedMetrics: [],
    });
  });

  it('rejects other providers', () => {
    expect(checkSupport(resource({ provider: 'azure' }), 'us-east-1').reason).toBe(
      'Provider "azure" not supported (only "aws" is supported)',
    );
  });

  it('rejects other regions', () => {
    expect(checkSupport(resource({ region: 'eu-west-1' }), 'us-east-1').reason).toBe(
      'Region not supported by this binary (plugin region: us-east-1, resource region: eu-west-1)',
    );
  });

  it('accepts global services without a region', () => {
    expect(checkSupport(resource({ resourceType: 's3', region: '' }), 'us-east-1').supported).toBe(true);
  });

  it('rejects unknown and no-charge types', () => {
    expect(checkSupport(resource({ resourceType: 'kinesis' }), 'us-east-1').reason).toBe(
      'Resource type "kinesis" not supported',
    );
    expect(checkSupport(resource({ resourceType: 'vpc' }), 'us-east-1').supported).toBe(false);
  });
});
