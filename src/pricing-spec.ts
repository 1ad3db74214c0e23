/**
 * Pricing Specification
 * Describes how a resource is billed (mode, headline rate, assumptions)
 * without computing a cost.
 */

import {
  TagAttributes,
  extractComputeAttributes,
  extractLoadBalancerAttributes,
  normalizeArchitecture,
} from './attribute-extractor';
import { notFoundDetail } from './cost-calculator';
import type { Logger } from './logger';
import type { PricingSource } from './pricing-data';
import type { BillingMode, PricingSpec, PricingTier, ResourceDescriptor, ResourceIdentity } from './types';

export const PRICING_SOURCE = 'aws-public';

type SpecBuilder = (resource: ResourceDescriptor) => PricingSpec;

interface SpecFields {
  sku?: string;
  billingMode: BillingMode;
  ratePerUnit: number;
  unit?: string;
  description: string;
  assumptions: string[];
}

/**
 * Render tier boundaries as assumption lines, e.g. "  0-10240 GB: $0.5000/GB"
 */
export function describeTiers(tiers: PricingTier[], unit: string, perUnit: string): string[] {
  const lines: string[] = [];
  let previous = 0;
  for (const tier of tiers) {
    if (Number.isFinite(tier.upTo)) {
      lines.push(`  ${previous.toFixed(0)}-${tier.upTo.toFixed(0)} ${unit}: $${tier.rate.toFixed(4)}/${perUnit}`);
      previous = tier.upTo;
    } else {
      lines.push(`  Above ${previous.toFixed(0)} ${unit}: $${tier.rate.toFixed(4)}/${perUnit}`);
    }
  }
  return lines;
}

export class PricingSpecBuilder {
  private readonly pricing: PricingSource;
  private readonly logger: Logger;
  private readonly builders: Partial<Record<string, SpecBuilder>>;

  constructor(pricing: PricingSource, logger: Logger) {
    this.pricing = pricing;
    this.logger = logger;
    this.builders = this.initializeBuilders();
  }

  /**
   * Pricing specification for a validated resource
   */
  build(resource: ResourceDescriptor, identity: ResourceIdentity): PricingSpec {
    const builder = this.builders[identity.serviceCode];
    if (!builder) {
      return this.spec(resource, {
        billingMode: 'unknown',
        ratePerUnit: 0,
        description: `Resource type "${resource.resourceType}" not supported for pricing specification`,
        assumptions: [],
      });
    }
    return builder(resource);
  }

  private initializeBuilders(): Partial<Record<string, SpecBuilder>> {
    return {
      ec2: resource => this.ec2Spec(resource),
      ebs: resource => this.ebsSpec(resource),
      s3: resource => this.s3Spec(resource),
      lambda: resource => this.lambdaSpec(resource),
      rds: resource => this.rdsSpec(resource),
      dynamodb: resource => this.dynamoDBSpec(resource),
      eks: resource => this.eksSpec(resource),
      elb: resource => this.loadBalancerSpec(resource),
      natgw: resource => this.natGatewaySpec(resource),
      cloudwatch: resource => this.cloudWatchSpec(resource),
      elasticache: resource => this.elastiCacheSpec(resource),
    };
  }

  private spec(resource: ResourceDescriptor, fields: SpecFields): PricingSpec {
    return {
      provider: resource.provider,
      resourceType: resource.resourceType,
      sku: fields.sku ?? resource.sku,
      region: resource.region,
      billingMode: fields.billingMode,
      ratePerUnit: fields.ratePerUnit,
      currency: 'USD',
      unit: fields.unit,
      description: fields.description,
      assumptions: fields.assumptions,
      source: PRICING_SOURCE,
    };
  }

  private reader(resource: ResourceDescriptor): TagAttributes {
    return new TagAttributes(resource.tags, this.logger);
  }

  private ec2Spec(resource: ResourceDescriptor): PricingSpec {
    const { os, tenancy } = extractComputeAttributes(this.reader(resource));
    const price = this.pricing.ec2OnDemandPrice(resource.sku, os, tenancy);
    if (!price.found) {
      return this.spec(resource, {
        billingMode: 'per_hour',
        ratePerUnit: 0,
        unit: 'hour',
        description: notFoundDetail('EC2 instance type', resource.sku),
        assumptions: ['Instance type not found in embedded pricing data'],
      });
    }

    return this.spec(resource, {
      billingMode: 'per_hour',
      ratePerUnit: price.rate,
      unit: 'hour',
      description: `On-demand ${os} EC2 instance with ${tenancy} tenancy`,
      assumptions: [
        `Operating System: ${os}`,
        `Tenancy: ${tenancy}`,
        'Pre-installed software: None',
        'Capacity Status: Used',
      ],
    });
  }

  private ebsSpec(resource: ResourceDescriptor): PricingSpec {
    const price = this.pricing.ebsPricePerGBMonth(resource.sku);
    if (!price.found) {
      return this.spec(resource, {
        billingMode: 'per_gb_month',
        ratePerUnit: 0,
        unit: 'GB-month',
        description: notFoundDetail('EBS volume type', resource.sku),
        assumptions: ['Volume type not found in embedded pricing data'],
      });
    }

    return this.spec(resource, {
      billingMode: 'per_gb_month',
      ratePerUnit: price.rate,
      unit: 'GB-month',
      description: `EBS ${resource.sku} storage`,
      assumptions: ['Storage only (IOPS/throughput not included)', 'Standard provisioned capacity'],
    });
  }

  private s3Spec(resource: ResourceDescriptor): PricingSpec {
    const storageClass = resource.sku || 'STANDARD';
    const price = this.pricing.s3PricePerGBMonth(storageClass);
    if (!price.found) {
      return this.spec(resource, {
        sku: storageClass,
        billingMode: 'per_gb_month',
        ratePerUnit: 0,
        unit: 'GB-month',
        description: notFoundDetail('S3 storage class', storageClass),
        assumptions: ['Storage class not found in embedded pricing data'],
      });
    }

    return this.spec(resource, {
      sku: storageClass,
      billingMode: 'per_gb_month',
      ratePerUnit: price.rate,
      unit: 'GB-month',
      description: `S3 ${storageClass} storage`,
      assumptions: ['Storage cost only', 'Requests and data transfer billed separately', 'Lifecycle transitions not included'],
    });
  }

  private lambdaSpec(resource: ResourceDescriptor): PricingSpec {
    const reader = this.reader(resource);
    const arch = normalizeArchitecture(reader.getString('architecture') ?? reader.getString('arch') ?? resource.sku);

    const requestPrice = this.pricing.lambdaPricePerRequest();
    const gbSecondPrice = this.pricing.lambdaPricePerGBSecond(arch);
    if (!requestPrice.found || !gbSecondPrice.found) {
      return this.spec(resource, {
        sku: arch,
        billingMode: 'per_request_and_gb_second',
        ratePerUnit: 0,
        description: 'Lambda pricing not found in embedded data',
        assumptions: ['Lambda pricing data not available'],
      });
    }

    return this.spec(resource, {
      sku: arch,
      billingMode: 'per_request_and_gb_second',
      ratePerUnit: gbSecondPrice.rate,
      unit: 'GB-second',
      description: `Lambda ${arch} architecture`,
      assumptions: [
        `Request rate: $${requestPrice.rate.toFixed(10)} per request`,
        `Compute rate: $${gbSecondPrice.rate.toFixed(10)} per GB-second (${arch})`,
        'Provisioned concurrency not included',
        'Lambda@Edge pricing differs',
      ],
    });
  }

  private rdsSpec(resource: ResourceDescriptor): PricingSpec {
    const engine = this.reader(resource).getString('engine') ?? 'mysql';
    const price = this.pricing.rdsOnDemandPrice(resource.sku, engine);
    if (!price.found) {
      return this.spec(resource, {
        billingMode: 'per_hour',
        ratePerUnit: 0,
        unit: 'hour',
        description: notFoundDetail('RDS instance', resource.sku),
        assumptions: [`Instance type ${resource.sku} with engine ${engine} not found`],
      });
    }

    return this.spec(resource, {
      billingMode: 'per_hour',
      ratePerUnit: price.rate,
      unit: 'hour',
      description: `RDS ${resource.sku} instance with ${engine} engine`,
      assumptions: [
        `Database engine: ${engine}`,
        'Single-AZ deployment',
        'Storage costs billed separately',
        'Backup storage not included',
        'Read replicas billed separately',
      ],
    });
  }

  private dynamoDBSpec(resource: ResourceDescriptor): PricingSpec {
    const mode = resource.sku || 'on-demand';
    const storage = this.pricing.dynamoDBStoragePricePerGBMonth();

    if (mode.toLowerCase() === 'provisioned') {
      const rcu = this.pricing.dynamoDBProvisionedRCUPrice();
      const wcu = this.pricing.dynamoDBProvisionedWCUPrice();
      if (!rcu.found || !wcu.found || !storage.found) {
        return this.spec(resource, {
          sku: mode,
          billingMode: 'provisioned_capacity',
          ratePerUnit: 0,
          description: 'DynamoDB provisioned pricing not found',
          assumptions: ['Provisioned capacity pricing data not available'],
        });
      }

      return this.spec(resource, {
        sku: mode,
        billingMode: 'provisioned_capacity',
        ratePerUnit: rcu.rate,
        unit: 'RCU-hour',
        description: 'DynamoDB provisioned capacity mode',
        assumptions: [
          `Read Capacity Unit: $${rcu.rate.toFixed(6)} per hour`,
          `Write Capacity Unit: $${wcu.rate.toFixed(6)} per hour`,
          `Storage: $${storage.rate.toFixed(4)} per GB-month`,
          'Auto-scaling adjustments not included',
          'Reserved capacity discounts not applied',
        ],
      });
    }

    const read = this.pricing.dynamoDBOnDemandReadPrice();
    const write = this.pricing.dynamoDBOnDemandWritePrice();
    if (!read.found || !write.found || !storage.found) {
      return this.spec(resource, {
        sku: mode,
        billingMode: 'on_demand',
        ratePerUnit: 0,
        description: 'DynamoDB on-demand pricing not found',
        assumptions: ['On-demand pricing data not available'],
      });
    }

    return this.spec(resource, {
      sku: mode,
      billingMode: 'on_demand',
      ratePerUnit: storage.rate,
      unit: 'GB-month',
      description: 'DynamoDB on-demand capacity mode',
      assumptions: [
        `Read request units: $${(read.rate * 1_000_000).toFixed(6)} per million`,
        `Write request units: $${(write.rate * 1_000_000).toFixed(6)} per million`,
        `Storage: $${storage.rate.toFixed(4)} per GB-month`,
        'Global tables replication costs not included',
        'DynamoDB Streams not included',
      ],
    });
  }

  private eksSpec(resource: ResourceDescriptor): PricingSpec {
    const tagged = this.reader(resource).getString('support_type')?.toLowerCase();
    const supportType = tagged === 'extended' || resource.sku === 'cluster-extended' ? 'extended' : 'standard';

    const price = this.pricing.eksClusterPricePerHour(supportType === 'extended');
    if (!price.found) {
      return this.spec(resource, {
        sku: supportType,
        billingMode: 'per_hour',
        ratePerUnit: 0,
        unit: 'hour',
        description: 'EKS pricing not found in embedded data',
        assumptions: ['EKS pricing data not available'],
      });
    }

    return this.spec(resource, {
      sku: supportType,
      billingMode: 'per_hour',
      ratePerUnit: price.rate,
      unit: 'hour',
      description: `EKS cluster with ${supportType} support`,
      assumptions: [
        'Control plane costs only',
        'Worker node EC2 instances billed separately',
        'EKS add-ons may incur additional costs',
        'Data transfer costs not included',
      ],
    });
  }

  private loadBalancerSpec(resource: ResourceDescriptor): PricingSpec {
    const { kind } = extractLoadBalancerAttributes(resource.sku, this.reader(resource), this.logger);
    const nlb = kind === 'nlb';
    const label = nlb ? 'NLB' : 'ALB';
    const unitLabel = nlb ? 'NLCU' : 'LCU';
    const billingMode: BillingMode = nlb ? 'per_hour_plus_nlcu' : 'per_hour_plus_lcu';

    const hourly = this.pricing.loadBalancerPricePerHour(kind);
    const perUnit = this.pricing.loadBalancerPricePerCapacityUnit(kind);
    if (!hourly.found || !perUnit.found) {
      return this.spec(resource, {
        sku: kind,
        billingMode,
        ratePerUnit: 0,
        description: `${label} pricing not found in embedded data`,
        assumptions: [`${label} pricing data not available`],
      });
    }

    return this.spec(resource, {
      sku: kind,
      billingMode,
      ratePerUnit: hourly.rate,
      unit: 'hour',
      description: nlb ? 'Network Load Balancer' : 'Application Load Balancer',
      assumptions: [
        `Fixed hourly rate: $${hourly.rate.toFixed(4)}`,
        `${unitLabel} rate: $${perUnit.rate.toFixed(4)} per ${unitLabel}-hour`,
        'Data transfer costs not included',
        nlb ? 'Cross-zone data transfer may incur additional costs' : 'SSL/TLS termination included',
      ],
    });
  }

  private natGatewaySpec(resource: ResourceDescriptor): PricingSpec {
    const hourly = this.pricing.natGatewayPricePerHour();
    const tiers = this.pricing.natGatewayDataTiers();
    if (!hourly.found || tiers.length === 0) {
      return this.spec(resource, {
        billingMode: 'per_hour_plus_data',
        ratePerUnit: 0,
        description: 'NAT Gateway pricing not found in embedded data',
        assumptions: ['NAT Gateway pricing data not available'],
      });
    }

    return this.spec(resource, {
      billingMode: 'per_hour_plus_data',
      ratePerUnit: hourly.rate,
      unit: 'hour',
      description: 'NAT Gateway',
      assumptions: [
        `Hourly rate: $${hourly.rate.toFixed(4)}`,
        `Data processing: $${tiers[0].rate.toFixed(4)} per GB`,
        'Data transfer OUT to internet billed separately',
        'Cross-AZ data transfer costs not included',
      ],
    });
  }

  private cloudWatchSpec(resource: ResourceDescriptor): PricingSpec {
    if (resource.sku.toLowerCase() === 'metrics') {
      const tiers = this.pricing.cloudWatchMetricTiers();
      if (tiers.length === 0) {
        return this.spec(resource, {
          sku: 'metrics',
          billingMode: 'tiered_per_metric',
          ratePerUnit: 0,
          description: 'CloudWatch metrics pricing not found',
          assumptions: ['Metrics pricing data not available'],
        });
      }

      return this.spec(resource, {
        sku: 'metrics',
        billingMode: 'tiered_per_metric',
        ratePerUnit: tiers[0].rate,
        unit: 'metric-month',
        description: 'CloudWatch custom metrics',
        assumptions: ['Tiered pricing based on metric count:', ...describeTiers(tiers, 'metrics', 'metric')],
      });
    }

    const ingestion = this.pricing.cloudWatchLogsIngestionTiers();
    const storage = this.pricing.cloudWatchLogsStoragePricePerGBMonth();
    if (ingestion.length === 0 || !storage.found) {
      return this.spec(resource, {
        sku: 'logs',
        billingMode: 'tiered_ingestion_plus_storage',
        ratePerUnit: 0,
        description: 'CloudWatch logs pricing not found',
        assumptions: ['Logs pricing data not available'],
      });
    }

    return this.spec(resource, {
      sku: 'logs',
      billingMode: 'tiered_ingestion_plus_storage',
      ratePerUnit: ingestion[0].rate,
      unit: 'GB-ingested',
      description: 'CloudWatch Logs',
      assumptions: [
        `Storage: $${storage.rate.toFixed(4)} per GB-month`,
        'Ingestion tiered pricing:',
        ...describeTiers(ingestion, 'GB', 'GB'),
        'Logs Insights queries billed separately',
      ],
    });
  }

  private elastiCacheSpec(resource: ResourceDescriptor): PricingSpec {
    const engine = this.reader(resource).getString('engine')?.toLowerCase() ?? 'redis';
    const price = this.pricing.elastiCacheOnDemandPrice(resource.sku, engine);
    if (!price.found) {
      return this.spec(resource, {
        billingMode: 'per_hour',
        ratePerUnit: 0,
        unit: 'hour',
        description: notFoundDetail(`ElastiCache ${engine} node`, resource.sku),
        assumptions: ['Node type not found in embedded pricing data'],
      });
    }

    return this.spec(resource, {
      billingMode: 'per_hour',
      ratePerUnit: price.rate,
      unit: 'hour',
      description: `ElastiCache ${resource.sku} node running ${engine}`,
      assumptions: [`Cache engine: ${engine}`, 'Rate is per node; clusters bill every node', 'Backup storage not included'],
    });
  }
}
