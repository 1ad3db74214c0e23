import { describe, it, expect } from 'vitest';
import { InvalidRequestError, RegionMismatchError } from './errors';
import { silentLogger } from './logger';
import { RequestValidator, mergeRequestTags } from './request-validator';
import type { ResourceDescriptor } from './types';

const validator = new RequestValidator('us-east-1', silentLogger());

function descriptor(overrides: Partial<ResourceDescriptor> = {}): ResourceDescriptor {
  return { provider: 'aws', resourceType: 'ec2', sku: 't3.micro', region: 'us-east-1', tags: {}, ...overrides };
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

describe('RequestValidator.validateDescriptor', () => {
  it('accepts a descriptor in the engine region', () => {
    const { resource, identity } = validator.validateDescriptor(descriptor(), 'trace-1');
    expect(resource.region).toBe('us-east-1');
    expect(identity.service).toBe('compute-instance');
  });

  it.each([
    [undefined, 'resource is required'],
    [descriptor({ provider: '' }), 'provider is required'],
    [descriptor({ provider: 'gcp' }), 'only "aws" provider is supported'],
    [descriptor({ resourceType: '' }), 'resource_type is required'],
  ])('rejects malformed input with %#', (input, message) => {
    const error = captureError(() => validator.validateDescriptor(input, 'trace-1'));
    expect(error).toBeInstanceOf(InvalidRequestError);
    expect(error).toMatchObject({ message, kind: 'invalid_argument', code: 'INVALID_RESOURCE' });
  });

  it('does not require a SKU', () => {
    expect(() => validator.validateDescriptor(descriptor({ sku: '' }), 'trace-1')).not.toThrow();
  });

  it('reports region mismatches with routing details', () => {
    const error = captureError(() => validator.validateDescriptor(descriptor({ region: 'eu-west-1' }), 'trace-9'));
    expect(error).toBeInstanceOf(RegionMismatchError);
    expect(error).toMatchObject({
      message: 'region mismatch',
      code: 'UNSUPPORTED_REGION',
      details: {
        trace_id: 'trace-9',
        plugin_region: 'us-east-1',
        resource_region: 'eu-west-1',
        required_region: 'us-east-1',
      },
    });
  });

  it('gives global services without a region the engine region', () => {
    const input = descriptor({ resourceType: 'aws:s3/bucket:Bucket', sku: 'STANDARD', region: '' });
    const { resource } = validator.validateDescriptor(input, 'trace-1');
    expect(resource.region).toBe('us-east-1');
    expect(input.region).toBe('');
  });

  it('still requires a region for regional services', () => {
    expect(() => validator.validateDescriptor(descriptor({ region: '' }), 'trace-1')).toThrow(RegionMismatchError);
  });
});

describe('RequestValidator.resolveActualCostResource', () => {
  it('builds the resource from an ARN and a SKU tag', () => {
    const { resource, identity } = validator.resolveActualCostResource(
      {
        arn: 'arn:aws:ec2:us-east-1:123456789012:volume/vol-1',
        tags: { volumeType: 'gp3', size: '100', team: 'data' },
      },
      'trace-1',
    );
    expect(resource).toEqual({
      provider: 'aws',
      resourceType: 'ebs',
      sku: 'gp3',
      region: 'us-east-1',
      tags: { size: '100', team: 'data' },
    });
    expect(identity.service).toBe('block-volume');
  });

  it('requires a SKU alongside an ARN', () => {
    expect(() =>
      validator.resolveActualCostResource({ arn: 'arn:aws:ec2:us-east-1:1:instance/i-1', tags: {} }, 'trace-1'),
    ).toThrow(
      `failed to parse ARN "arn:aws:ec2:us-east-1:1:instance/i-1": ARN provided (arn:aws:ec2:us-east-1:1:instance/i-1) but tags missing 'sku' (instance type, volume type, etc.)`,
    );
  });

  it('wraps ARN syntax errors', () => {
    expect(() => validator.resolveActualCostResource({ arn: 'not-an-arn', tags: { sku: 't3.micro' } }, 'trace-1')).toThrow(
      'failed to parse ARN "not-an-arn": invalid ARN format: expected at least 6 colon-separated parts, got 1',
    );
  });

  it('rejects ARNs from another region', () => {
    expect(() =>
      validator.resolveActualCostResource(
        { arn: 'arn:aws:ec2:eu-west-1:1:instance/i-1', tags: { sku: 't3.micro' } },
        'trace-1',
      ),
    ).toThrow(RegionMismatchError);
  });

  it('assigns the engine region to global ARNs', () => {
    const { resource } = validator.resolveActualCostResource(
      { arn: 'arn:aws:s3:::my-bucket', tags: { sku: 'STANDARD' } },
      'trace-1',
    );
    expect(resource.region).toBe('us-east-1');
    expect(resource.resourceType).toBe('s3');
  });

  it('reads a JSON descriptor from the resource id', () => {
    const resourceId = JSON.stringify({
      provider: 'aws',
      resource_type: 'ec2',
      sku: 'm5.large',
      region: 'us-east-1',
      tags: { platform: 'windows' },
    });
    const { resource } = validator.resolveActualCostResource({ resourceId }, 'trace-1');
    expect(resource).toMatchObject({ resourceType: 'ec2', sku: 'm5.large', tags: { platform: 'windows' } });
  });

  it('falls back to tags when the resource id is not JSON', () => {
    const { resource } = validator.resolveActualCostResource(
      {
        resourceId: 'i-0abc',
        tags: { provider: 'aws', resource_type: 'ec2', instanceType: 't3.micro', availabilityZone: 'us-east-1a', env: 'dev' },
      },
      'trace-1',
    );
    expect(resource).toEqual({
      provider: 'aws',
      resourceType: 'ec2',
      sku: 't3.micro',
      region: 'us-east-1',
      tags: { instanceType: 't3.micro', availabilityZone: 'us-east-1a', env: 'dev' },
    });
  });

  it('explains what is missing', () => {
    expect(() => validator.resolveActualCostResource({}, 'trace-1')).toThrow(
      'missing resource information: provide ResourceId as JSON or use Tags',
    );
    expect(() => validator.resolveActualCostResource({ tags: { provider: 'aws', sku: 't3.micro' } }, 'trace-1')).toThrow(
      'resource information incomplete: need provider, resource_type, sku, region in ResourceId or Tags',
    );
  });
});

describe('mergeRequestTags', () => {
  it('overlays request tags on resource id tags', () => {
    const resourceId = JSON.stringify({ tags: { 'pulumi:created': '2025-01-01T00:00:00Z', env: 'prod' } });
    expect(mergeRequestTags({ resourceId, tags: { env: 'dev' } })).toEqual({
      'pulumi:created': '2025-01-01T00:00:00Z',
      env: 'dev',
    });
  });

  it('ignores resource ids that are not JSON', () => {
    expect(mergeRequestTags({ resourceId: 'i-123', tags: { a: '1' } })).toEqual({ a: '1' });
    expect(mergeRequestTags({})).toEqual({});
  });
});
