import { describe, it, expect } from 'vitest';
import { arnResourceType, parseArn } from './arn';

describe('parseArn', () => {
  it('splits an EC2 instance ARN', () => {
    expect(parseArn('arn:aws:ec2:us-east-1:123456789012:instance/i-0abc')).toEqual({
      partition: 'aws',
      service: 'ec2',
      region: 'us-east-1',
      accountId: '123456789012',
      resourceType: 'instance',
      resourceId: 'i-0abc',
    });
  });

  it('keeps colons inside the resource part', () => {
    const arn = parseArn('arn:aws:logs:us-east-1:123456789012:log-group:/app/web:*');
    expect(arn.resourceType).toBe('log-group');
    expect(arn.resourceId).toBe('/app/web:*');
  });

  it('splits at a slash when it comes before any colon', () => {
    const arn = parseArn('arn:aws:elasticloadbalancing:us-east-1:123456789012:loadbalancer/app/web:1/50dc6c495c0c9188');
    expect(arn.resourceType).toBe('loadbalancer');
    expect(arn.resourceId).toBe('app/web:1/50dc6c495c0c9188');
  });

  it('accepts global resources with no region', () => {
    const arn = parseArn('arn:aws:s3:::my-bucket');
    expect(arn.region).toBe('');
    expect(arn.resourceType).toBe('my-bucket');
    expect(arn.resourceId).toBe('');
  });

  it.each([
    ['', 'ARN is empty'],
    ['arn:aws:ec2', 'invalid ARN format: expected at least 6 colon-separated parts, got 3'],
    ['urn:aws:ec2:us-east-1:1:instance/i-1', `invalid ARN: must start with 'arn:', got "urn"`],
    ['arn::ec2:us-east-1:1:instance/i-1', 'invalid ARN: partition is empty'],
    ['arn:aws-moon:ec2:us-east-1:1:instance/i-1', 'invalid ARN partition: "aws-moon"'],
    ['arn:aws::us-east-1:1:instance/i-1', 'invalid ARN: service is empty'],
    ['arn:aws:ec2:us-east-1:1:', 'invalid ARN: resource part is empty'],
  ])('rejects %j', (arn, message) => {
    expect(() => parseArn(arn)).toThrow(message);
  });

  it('explains that isolated partitions have no public pricing', () => {
    expect(() => parseArn('arn:aws-iso-b:ec2:us-isob-east-1:1:instance/i-1')).toThrow(
      'unsupported ARN partition "aws-iso-b": isolated partitions (aws-iso, aws-iso-b) do not have public pricing data available',
    );
  });
});

describe('arnResourceType', () => {
  it('maps EC2 volumes to EBS', () => {
    expect(arnResourceType(parseArn('arn:aws:ec2:us-east-1:1:volume/vol-1'))).toBe('ebs');
  });

  it('maps services onto canonical types', () => {
    expect(arnResourceType(parseArn('arn:aws:ec2:us-east-1:1:instance/i-1'))).toBe('ec2');
    expect(arnResourceType(parseArn('arn:aws:rds:us-east-1:1:db:prod'))).toBe('rds');
    expect(arnResourceType(parseArn('arn:aws:elasticloadbalancing:us-east-1:1:loadbalancer/app/web/1'))).toBe('elb');
  });
});
