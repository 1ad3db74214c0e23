/**
 * Service Metadata
 * FOCUS 1.2 service names and categories, pricing units and growth types
 * for each canonical service code.
 */

import type { FocusCostRecord, GrowthType } from './types';

const SERVICE_NAMES: Record<string, string> = {
  ec2: 'Amazon EC2',
  ebs: 'Amazon EBS',
  s3: 'Amazon S3',
  rds: 'Amazon RDS',
  lambda: 'AWS Lambda',
  dynamodb: 'Amazon DynamoDB',
  eks: 'Amazon EKS',
  elb: 'Elastic Load Balancing',
  natgw: 'Amazon VPC NAT Gateway',
  cloudwatch: 'Amazon CloudWatch',
  elasticache: 'Amazon ElastiCache',
};

export type ServiceCategory = 'Compute' | 'Storage' | 'Databases' | 'Networking' | 'Management and Governance' | 'Other';

const SERVICE_CATEGORIES: Record<string, ServiceCategory> = {
  ec2: 'Compute',
  lambda: 'Compute',
  eks: 'Compute',
  ebs: 'Storage',
  s3: 'Storage',
  rds: 'Databases',
  dynamodb: 'Databases',
  elasticache: 'Databases',
  elb: 'Networking',
  natgw: 'Networking',
  cloudwatch: 'Management and Governance',
};

const PRICING_UNITS: Record<string, string> = {
  ec2: 'Hours',
  rds: 'Hours',
  eks: 'Hours',
  elb: 'Hours',
  natgw: 'Hours',
  elasticache: 'Hours',
  ebs: 'GB-Mo',
  s3: 'GB-Mo',
  lambda: 'GB-Seconds',
  dynamodb: 'Requests',
  cloudwatch: 'GB',
};

// Services whose cost grows with accumulated data
const LINEAR_GROWTH = new Set(['s3', 'dynamodb']);

export function serviceName(serviceCode: string): string {
  return SERVICE_NAMES[serviceCode] ?? `AWS ${serviceCode}`;
}

export function serviceCategory(serviceCode: string): ServiceCategory {
  return SERVICE_CATEGORIES[serviceCode] ?? 'Other';
}

export function pricingUnit(serviceCode: string): string {
  return PRICING_UNITS[serviceCode] ?? 'Units';
}

export function growthType(serviceCode: string): GrowthType {
  return LINEAR_GROWTH.has(serviceCode) ? 'linear' : 'none';
}

export interface FocusRecordInput {
  serviceCode: string;
  resourceType: string;
  resourceId?: string;
  region: string;
  sku: string;
  cost: number;
  unitPrice: number;
  pricingUnit: string;
  pricingQuantity: number;
  start: Date;
  end: Date;
}

/**
 * Build a FOCUS cost record for a public-pricing estimate.
 * List, billed and effective cost are equal: no discounts apply.
 */
export function buildFocusRecord(input: FocusRecordInput): FocusCostRecord {
  return {
    chargePeriodStart: input.start.toISOString(),
    chargePeriodEnd: input.end.toISOString(),
    chargeCategory: 'usage',
    chargeClass: 'regular',
    chargeFrequency: 'usage-based',
    chargeDescription: `Public pricing estimate for ${input.resourceType} in ${input.region}`,
    pricingCategory: 'standard',
    pricingUnit: input.pricingUnit,
    pricingQuantity: input.pricingQuantity,
    listUnitPrice: input.unitPrice,
    billedCost: input.cost,
    effectiveCost: input.cost,
    listCost: input.cost,
    billingCurrency: 'USD',
    serviceName: serviceName(input.serviceCode),
    serviceCategory: serviceCategory(input.serviceCode),
    serviceProviderName: 'AWS',
    regionId: input.region,
    resourceId: input.resourceId ?? '',
    resourceType: input.resourceType,
    skuId: input.sku,
  };
}
