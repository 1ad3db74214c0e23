/**
 * AWS Pricing Data
 * Read-only rate lookups backed by the bundled public price list
 * (data/pricing/<region>.json). Regions without their own file are derived
 * from us-east-1 with a regional multiplier.
 *
 * Lookups never throw: a missing SKU is reported as { rate: 0, found: false }.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { PricingTier, RateLookup } from './types';

export const HOURS_PER_MONTH = 730; // Average hours in a month
export const BASE_REGION = 'us-east-1';

export type OperatingSystem = 'Linux' | 'Windows' | 'RHEL' | 'SUSE';
export type Tenancy = 'Shared' | 'Dedicated' | 'Host';
export type Architecture = 'x86_64' | 'arm64';
export type LoadBalancerKind = 'alb' | 'nlb';

/**
 * Pricing lookups consumed by the cost calculators and recommenders
 */
export interface PricingSource {
  readonly region: string;
  ec2OnDemandPrice(instanceType: string, os: OperatingSystem, tenancy: Tenancy): RateLookup;
  ebsPricePerGBMonth(volumeType: string): RateLookup;
  s3PricePerGBMonth(storageClass: string): RateLookup;
  rdsOnDemandPrice(instanceType: string, engine: string): RateLookup;
  rdsStoragePricePerGBMonth(storageType: string): RateLookup;
  eksClusterPricePerHour(extendedSupport: boolean): RateLookup;
  lambdaPricePerRequest(): RateLookup;
  lambdaPricePerGBSecond(arch: Architecture): RateLookup;
  dynamoDBOnDemandReadPrice(): RateLookup;
  dynamoDBOnDemandWritePrice(): RateLookup;
  dynamoDBStoragePricePerGBMonth(): RateLookup;
  dynamoDBProvisionedRCUPrice(): RateLookup;
  dynamoDBProvisionedWCUPrice(): RateLookup;
  loadBalancerPricePerHour(kind: LoadBalancerKind): RateLookup;
  loadBalancerPricePerCapacityUnit(kind: LoadBalancerKind): RateLookup;
  natGatewayPricePerHour(): RateLookup;
  /** Empty when no data-processing rates are known */
  natGatewayDataTiers(): PricingTier[];
  cloudWatchLogsIngestionTiers(): PricingTier[];
  cloudWatchLogsStoragePricePerGBMonth(): RateLookup;
  cloudWatchMetricTiers(): PricingTier[];
  elastiCacheOnDemandPrice(nodeType: string, engine: string): RateLookup;
}

const rateTable = z.record(z.string(), z.number().nonnegative());

const tierList = z.array(
  z.object({
    upTo: z.number().positive().nullable(),
    rate: z.number().nonnegative(),
  }),
);

const priceListSchema = z.object({
  region: z.string(),
  currency: z.literal('USD'),
  ec2: z.record(z.string(), rateTable),
  ebs: rateTable,
  s3: rateTable,
  rds: z.object({
    instances: z.record(z.string(), rateTable),
    storage: rateTable,
  }),
  eks: z.object({ standard: z.number(), extended: z.number() }),
  lambda: z.object({
    requestPrice: z.number(),
    gbSecond: rateTable,
  }),
  dynamodb: z.object({
    provisioned: z.object({ rcuHour: z.number(), wcuHour: z.number() }),
    onDemand: z.object({ readRequest: z.number(), writeRequest: z.number() }),
    storageGbMonth: z.number(),
  }),
  elb: z.record(z.string(), z.object({ hourly: z.number(), capacityUnitHourly: z.number() })),
  natgw: z.object({ hourly: z.number(), dataTiers: tierList }),
  cloudwatch: z.object({
    logsIngestionTiers: tierList,
    logsStorageGbMonth: z.number(),
    metricTiers: tierList,
  }),
  elasticache: z.record(z.string(), rateTable),
});

export type PriceList = z.infer<typeof priceListSchema>;

// Regional pricing multipliers (relative to us-east-1)
const REGIONAL_MULTIPLIERS: Record<string, number> = {
  'us-east-1': 1.0,
  'us-east-2': 1.0,
  'us-west-1': 1.1,
  'us-west-2': 1.0,
  'eu-west-1': 1.05,
  'eu-west-2': 1.08,
  'eu-west-3': 1.1,
  'eu-central-1': 1.08,
  'eu-north-1': 1.05,
  'ap-southeast-1': 1.1,
  'ap-southeast-2': 1.15,
  'ap-northeast-1': 1.15,
  'ap-northeast-2': 1.12,
  'ap-south-1': 1.05,
  'ca-central-1': 1.05,
  'sa-east-1': 1.5,
};

const DEFAULT_MULTIPLIER = 1.1;

const RDS_ENGINE_DISPLAY: Record<string, string> = {
  mysql: 'MySQL',
  postgresql: 'PostgreSQL',
  postgres: 'PostgreSQL',
  mariadb: 'MariaDB',
  oracle: 'Oracle',
  sqlserver: 'SQL Server',
  'aurora-mysql': 'Aurora MySQL',
  aurora: 'Aurora MySQL',
  'aurora-postgresql': 'Aurora PostgreSQL',
};

const MISSING: RateLookup = { rate: 0, found: false };

function lookup(table: Record<string, number> | undefined, key: string): RateLookup {
  if (!table || !Object.prototype.hasOwnProperty.call(table, key)) return MISSING;
  return { rate: table[key], found: true };
}

function present(rate: number): RateLookup {
  return { rate, found: true };
}

function toTiers(tiers: PriceList['natgw']['dataTiers']): PricingTier[] {
  return tiers.map(tier => ({ upTo: tier.upTo ?? Infinity, rate: tier.rate }));
}

/**
 * Directory holding the bundled price lists, from either src/ or dist/src/
 */
export function pricingDataDir(): string {
  const candidates = [
    path.resolve(__dirname, '..', 'data', 'pricing'),
    path.resolve(__dirname, '..', '..', 'data', 'pricing'),
  ];
  return candidates.find(dir => fs.existsSync(dir)) ?? candidates[0];
}

/**
 * Parse and validate a price list document
 */
export function parsePriceList(raw: unknown, origin: string): PriceList {
  const result = priceListSchema.safeParse(raw);
  if (!result.success) {
    const first = result.error.issues[0];
    throw new Error(`Invalid pricing data in ${origin}: ${first.path.join('.')}: ${first.message}`);
  }
  return result.data;
}

export function loadPriceList(region: string, dataDir: string = pricingDataDir()): PriceList {
  const regionalFile = path.join(dataDir, `${region}.json`);
  if (fs.existsSync(regionalFile)) {
    return parsePriceList(JSON.parse(fs.readFileSync(regionalFile, 'utf-8')), regionalFile);
  }

  const baseFile = path.join(dataDir, `${BASE_REGION}.json`);
  const base = parsePriceList(JSON.parse(fs.readFileSync(baseFile, 'utf-8')), baseFile);
  return applyMultiplier({ ...base, region }, getRegionalMultiplier(region));
}

export function getRegionalMultiplier(region: string): number {
  return REGIONAL_MULTIPLIERS[region] ?? DEFAULT_MULTIPLIER;
}

function applyMultiplier(pricing: PriceList, multiplier: number): PriceList {
  const scaleTable = (table: Record<string, number>): Record<string, number> =>
    Object.fromEntries(Object.entries(table).map(([key, rate]) => [key, rate * multiplier]));
  const scaleNested = (tables: Record<string, Record<string, number>>): Record<string, Record<string, number>> =>
    Object.fromEntries(Object.entries(tables).map(([key, table]) => [key, scaleTable(table)]));
  const scaleTiers = (tiers: PriceList['natgw']['dataTiers']) =>
    tiers.map(tier => ({ upTo: tier.upTo, rate: tier.rate * multiplier }));

  return {
    ...pricing,
    ec2: scaleNested(pricing.ec2),
    ebs: scaleTable(pricing.ebs),
    s3: scaleTable(pricing.s3),
    rds: { instances: scaleNested(pricing.rds.instances), storage: scaleTable(pricing.rds.storage) },
    eks: { standard: pricing.eks.standard * multiplier, extended: pricing.eks.extended * multiplier },
    lambda: { requestPrice: pricing.lambda.requestPrice * multiplier, gbSecond: scaleTable(pricing.lambda.gbSecond) },
    dynamodb: {
      provisioned: {
        rcuHour: pricing.dynamodb.provisioned.rcuHour * multiplier,
        wcuHour: pricing.dynamodb.provisioned.wcuHour * multiplier,
      },
      onDemand: {
        readRequest: pricing.dynamodb.onDemand.readRequest * multiplier,
        writeRequest: pricing.dynamodb.onDemand.writeRequest * multiplier,
      },
      storageGbMonth: pricing.dynamodb.storageGbMonth * multiplier,
    },
    elb: Object.fromEntries(
      Object.entries(pricing.elb).map(([key, lb]) => [
        key,
        { hourly: lb.hourly * multiplier, capacityUnitHourly: lb.capacityUnitHourly * multiplier },
      ]),
    ),
    natgw: { hourly: pricing.natgw.hourly * multiplier, dataTiers: scaleTiers(pricing.natgw.dataTiers) },
    cloudwatch: {
      logsIngestionTiers: scaleTiers(pricing.cloudwatch.logsIngestionTiers),
      logsStorageGbMonth: pricing.cloudwatch.logsStorageGbMonth * multiplier,
      metricTiers: scaleTiers(pricing.cloudwatch.metricTiers),
    },
    elasticache: scaleNested(pricing.elasticache),
  };
}

/**
 * PricingSource over an in-memory price list
 */
export class EmbeddedPricingSource implements PricingSource {
  readonly region: string;
  private readonly data: PriceList;

  constructor(data: PriceList) {
    this.region = data.region;
    this.data = data;
  }

  static forRegion(region: string, dataDir?: string): EmbeddedPricingSource {
    return new EmbeddedPricingSource(loadPriceList(region, dataDir));
  }

  ec2OnDemandPrice(instanceType: string, os: OperatingSystem, tenancy: Tenancy): RateLookup {
    return lookup(this.data.ec2[`${os}/${tenancy}`], instanceType);
  }

  ebsPricePerGBMonth(volumeType: string): RateLookup {
    return lookup(this.data.ebs, volumeType.toLowerCase());
  }

  s3PricePerGBMonth(storageClass: string): RateLookup {
    return lookup(this.data.s3, storageClass.toUpperCase());
  }

  rdsOnDemandPrice(instanceType: string, engine: string): RateLookup {
    const display = RDS_ENGINE_DISPLAY[engine.toLowerCase()] ?? engine;
    return lookup(this.data.rds.instances[display], instanceType);
  }

  rdsStoragePricePerGBMonth(storageType: string): RateLookup {
    return lookup(this.data.rds.storage, storageType.toLowerCase());
  }

  eksClusterPricePerHour(extendedSupport: boolean): RateLookup {
    return present(extendedSupport ? this.data.eks.extended : this.data.eks.standard);
  }

  lambdaPricePerRequest(): RateLookup {
    return present(this.data.lambda.requestPrice);
  }

  lambdaPricePerGBSecond(arch: Architecture): RateLookup {
    return lookup(this.data.lambda.gbSecond, arch);
  }

  dynamoDBOnDemandReadPrice(): RateLookup {
    return present(this.data.dynamodb.onDemand.readRequest);
  }

  dynamoDBOnDemandWritePrice(): RateLookup {
    return present(this.data.dynamodb.onDemand.writeRequest);
  }

  dynamoDBStoragePricePerGBMonth(): RateLookup {
    return present(this.data.dynamodb.storageGbMonth);
  }

  dynamoDBProvisionedRCUPrice(): RateLookup {
    return present(this.data.dynamodb.provisioned.rcuHour);
  }

  dynamoDBProvisionedWCUPrice(): RateLookup {
    return present(this.data.dynamodb.provisioned.wcuHour);
  }

  loadBalancerPricePerHour(kind: LoadBalancerKind): RateLookup {
    const lb = this.data.elb[kind];
    return lb ? present(lb.hourly) : MISSING;
  }

  loadBalancerPricePerCapacityUnit(kind: LoadBalancerKind): RateLookup {
    const lb = this.data.elb[kind];
    return lb ? present(lb.capacityUnitHourly) : MISSING;
  }

  natGatewayPricePerHour(): RateLookup {
    return present(this.data.natgw.hourly);
  }

  natGatewayDataTiers(): PricingTier[] {
    return toTiers(this.data.natgw.dataTiers);
  }

  cloudWatchLogsIngestionTiers(): PricingTier[] {
    return toTiers(this.data.cloudwatch.logsIngestionTiers);
  }

  cloudWatchLogsStoragePricePerGBMonth(): RateLookup {
    return present(this.data.cloudwatch.logsStorageGbMonth);
  }

  cloudWatchMetricTiers(): PricingTier[] {
    return toTiers(this.data.cloudwatch.metricTiers);
  }

  elastiCacheOnDemandPrice(nodeType: string, engine: string): RateLookup {
    return lookup(this.data.elasticache[engine.toLowerCase()], nodeType);
  }
}
