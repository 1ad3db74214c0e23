import { describe, it, expect } from 'vitest';
import { buildFocusRecord, growthType, pricingUnit, serviceCategory, serviceName } from './service-metadata';

describe('service metadata', () => {
  it('names services the way AWS does', () => {
    expect(serviceName('ec2')).toBe('Amazon EC2');
    expect(serviceName('natgw')).toBe('Amazon VPC NAT Gateway');
    expect(serviceName('kinesis')).toBe('AWS kinesis');
  });

  it('assigns FOCUS categories', () => {
    expect(serviceCategory('lambda')).toBe('Compute');
    expect(serviceCategory('s3')).toBe('Storage');
    expect(serviceCategory('dynamodb')).toBe('Databases');
    expect(serviceCategory('elb')).toBe('Networking');
    expect(serviceCategory('cloudwatch')).toBe('Management and Governance');
    expect(serviceCategory('vpc')).toBe('Other');
  });

  it('picks pricing units per service', () => {
    expect(pricingUnit('ec2')).toBe('Hours');
    expect(pricingUnit('ebs')).toBe('GB-Mo');
    expect(pricingUnit('lambda')).toBe('GB-Seconds');
    expect(pricingUnit('unknown')).toBe('Units');
  });

  it('classifies storage-like services as linear growth', () => {
    expect(growthType('s3')).toBe('linear');
    expect(growthType('dynamodb')).toBe('linear');
    expect(growthType('ec2')).toBe('none');
    expect(growthType('ebs')).toBe('none');
  });
});

describe('buildFocusRecord', () => {
  it('fills the record with equal list, billed and effective cost', () => {
    const record = buildFocusRecord({
      serviceCode: 'ec2',
      resourceType: 'aws:ec2/instance:Instance',
      resourceId: 'i-123',
      region: 'us-east-1',
      sku: 't3.micro',
      cost: 0.25,
      unitPrice: 0.0104,
      pricingUnit: 'Hours',
      pricingQuantity: 24,
      start: new Date('2025-01-01T00:00:00Z'),
      end: new Date('2025-01-02T00:00:00Z'),
    });

    expect(record).toEqual({
      chargePeriodStart: '2025-01-01T00:00:00.000Z',
      chargePeriodEnd: '2025-01-02T00:00:00.000Z',
      chargeCategory: 'usage',
      chargeClass: 'regular',
      chargeFrequency: 'usage-based',
      chargeDescription: 'Public pricing estimate for aws:ec2/instance:Instance in us-east-1',
      pricingCategory: 'standard',
      pricingUnit: 'Hours',
      pricingQuantity: 24,
      listUnitPrice: 0.0104,
      billedCost: 0.25,
      effectiveCost: 0.25,
      listCost: 0.25,
      billingCurrency: 'USD',
      serviceName: 'Amazon EC2',
      serviceCategory: 'Compute',
      serviceProviderName: 'AWS',
      regionId: 'us-east-1',
      resourceId: 'i-123',
      resourceType: 'aws:ec2/instance:Instance',
      skuId: 't3.micro',
    });
  });
});
