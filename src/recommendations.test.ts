import { describe, it, expect } from 'vitest';
import { InvalidRequestError } from './errors';
import { silentLogger } from './logger';
import { EmbeddedPricingSource, loadPriceList, type OperatingSystem, type PricingSource, type Tenancy } from './pricing-data';
import {
  RecommendationGenerator,
  matchesFilter,
  normalizeInput,
  normalizeRDSEngine,
  parseInstanceType,
  parseRDSInstanceType,
  type RecommendationOptions,
} from './recommendations';
import type { RateLookup, ResourceDescriptor } from './types';

const pricing = EmbeddedPricingSource.forRegion('us-east-1');

function generator(overrides: Partial<RecommendationOptions> = {}): RecommendationGenerator {
  return new RecommendationGenerator(
    pricing,
    { region: 'us-east-1', maxBatchSize: 100, strictValidation: false, ...overrides },
    silentLogger(),
  );
}

/**
 * Bundled rates with selected EC2 and EBS prices replaced
 */
class RepricedSource extends EmbeddedPricingSource {
  constructor(
    private readonly ec2Rates: Record<string, number>,
    private readonly ebsRates: Record<string, number> = {},
  ) {
    super(loadPriceList('us-east-1'));
  }

  ec2OnDemandPrice(instanceType: string, os: OperatingSystem, tenancy: Tenancy): RateLookup {
    const rate = this.ec2Rates[instanceType];
    return rate === undefined ? super.ec2OnDemandPrice(instanceType, os, tenancy) : { rate, found: true };
  }

  ebsPricePerGBMonth(volumeType: string): RateLookup {
    const rate = this.ebsRates[volumeType.toLowerCase()];
    return rate === undefined ? super.ebsPricePerGBMonth(volumeType) : { rate, found: true };
  }
}

function repricedGenerator(source: PricingSource): RecommendationGenerator {
  return new RecommendationGenerator(source, { region: 'us-east-1', maxBatchSize: 100, strictValidation: false }, silentLogger());
}

function target(resourceType: string, sku: string, tags: Record<string, string> = {}): ResourceDescriptor {
  return { provider: 'aws', resourceType, sku, region: 'us-east-1', tags };
}

describe('parsing helpers', () => {
  it('splits instance types at the first dot', () => {
    expect(parseInstanceType('m5.large')).toEqual({ family: 'm5', size: 'large' });
    expect(parseInstanceType('m5')).toBeUndefined();
    expect(parseInstanceType('.large')).toBeUndefined();
    expect(parseInstanceType('m5.')).toBeUndefined();
  });

  it('keeps the db. prefix in RDS families', () => {
    expect(parseRDSInstanceType('db.r5.xlarge')).toEqual({ family: 'db.r5', size: 'xlarge' });
    expect(parseRDSInstanceType('r5.xlarge')).toBeUndefined();
  });

  it.each([
    ['MySQL8', 'mysql'],
    ['postgres14', 'postgresql'],
    ['maria', 'mariadb'],
    ['oracle-se2', 'oracle'],
    ['sqlserver-ex', 'sqlserver'],
    ['aurora', 'aurora-mysql'],
    ['aurora-postgresql', 'aurora-postgresql'],
    ['DocDB', 'docdb'],
  ])('normalizes engine %s to %s', (input, expected) => {
    expect(normalizeRDSEngine(input)).toBe(expected);
  });
});

describe('RecommendationGenerator', () => {
  it('suggests a generation upgrade and a Graviton migration for EC2', () => {
    const { recommendations, summary } = generator().generate({ targetResources: [target('ec2', 'm5.large')] });

    expect(recommendations).toHaveLength(2);
    const [upgrade, graviton] = recommendations;

    expect(upgrade).toMatchObject({
      category: 'cost',
      actionType: 'modify',
      modificationType: 'generation_upgrade',
      currentConfig: { instance_type: 'm5.large' },
      recommendedConfig: { instance_type: 'm6i.large' },
      priority: 'MEDIUM',
      confidenceScore: 0.9,
      description: 'Upgrade from m5.large to m6i.large for better performance at same or lower cost',
      reasoning: [
        'Newer m6i instances offer better performance',
        'Drop-in replacement with no architecture changes required',
        'Alternative: consider m6g.large for ARM compatibility (~20% additional savings)',
      ],
      source: 'aws-public',
    });
    expect(upgrade.impact?.estimatedSavings).toBe(0);
    expect(upgrade.id).toMatch(/^[0-9a-f-]{36}$/);

    expect(graviton).toMatchObject({
      modificationType: 'graviton_migration',
      recommendedConfig: { instance_type: 'm6g.large', architecture: 'arm64' },
      priority: 'LOW',
      confidenceScore: 0.7,
      description: 'Migrate from m5.large to m6g.large (Graviton) for ~20% cost savings',
      metadata: { architecture_change: 'x86_64 -> arm64' },
    });
    expect(graviton.impact?.currentCost).toBeCloseTo(70.08, 6);
    expect(graviton.impact?.projectedCost).toBeCloseTo(56.21, 6);
    expect(graviton.impact?.estimatedSavings).toBeCloseTo(13.87, 6);

    expect(summary).toMatchObject({
      totalRecommendations: 2,
      currency: 'USD',
      projectionPeriod: 'monthly',
      countByCategory: { cost: 2 },
      countByActionType: { modify: 2 },
    });
    expect(summary.totalEstimatedSavings).toBeCloseTo(13.87, 6);
  });

  it('recommends gp3 for gp2 volumes using the size tag', () => {
    const { recommendations } = generator().generate({
      targetResources: [target('aws:ebs/volume:Volume', 'gp2', { size: '500' })],
    });

    expect(recommendations).toHaveLength(1);
    expect(recommendations[0]).toMatchObject({
      resource: { resourceType: 'ebs', sku: 'gp2' },
      modificationType: 'volume_type_upgrade',
      currentConfig: { volume_type: 'gp2', size_gb: '500' },
      recommendedConfig: { volume_type: 'gp3', size_gb: '500' },
      description: 'Upgrade 500GB gp2 volume to gp3 for ~20% cost savings',
    });
    expect(recommendations[0].impact?.estimatedSavings).toBeCloseTo(10, 6);
  });

  it('assumes 100 GB when the volume size is missing or invalid', () => {
    const { recommendations } = generator().generate({ targetResources: [target('ebs', 'gp2', { size: 'big' })] });
    expect(recommendations[0].currentConfig.size_gb).toBe('100');
    expect(recommendations[0].impact?.estimatedSavings).toBeCloseTo(2, 6);
  });

  it('leaves gp3 volumes alone', () => {
    expect(generator().generate({ targetResources: [target('ebs', 'gp3')] }).recommendations).toEqual([]);
  });

  it('recommends RDS upgrades for Graviton-capable engines', () => {
    const { recommendations } = generator().generate({
      targetResources: [target('rds', 'db.m5.large', { engine: 'postgres' })],
    });

    expect(recommendations.map(r => r.modificationType)).toEqual(['generation_upgrade', 'graviton_migration']);
    expect(recommendations[0].reasoning).toEqual([
      'Newer db.m6i instances offer better performance for postgresql',
      'Drop-in replacement with no architecture changes required',
      'Alternative: consider db.m7g.large for ARM compatibility (~20% additional savings)',
    ]);
    expect(recommendations[1].description).toBe(
      'Migrate RDS postgresql from db.m5.large to db.m6g.large (Graviton) for ~11% cost savings',
    );
    expect(recommendations[1].metadata).toEqual({ architecture_change: 'x86_64 -> arm64', engine: 'postgresql' });
  });

  it('skips Graviton for engines that do not support it', () => {
    const { recommendations } = generator().generate({
      targetResources: [target('rds', 'db.m5.large', { engine: 'oracle-ee' })],
    });
    expect(recommendations).toEqual([]);
  });

  it('carries resource correlation from the descriptor and tags', () => {
    const resource = { ...target('ec2', 'm5.large', { name: 'web-1' }), id: '  i-0abc  ', region: '' };
    const { recommendations } = generator().generate({ targetResources: [resource] });
    expect(recommendations[0].resource).toEqual({
      provider: 'aws',
      resourceType: 'ec2',
      region: 'us-east-1',
      sku: 'm5.large',
      id: 'i-0abc',
      name: 'web-1',
    });
  });

  it('expands a SKU-only filter into a single target', () => {
    const { recommendations } = generator().generate({ filter: { resourceType: 'aws:ec2/instance:Instance', sku: 't3.micro' } });
    expect(recommendations.map(r => r.recommendedConfig.instance_type)).toEqual(['t3a.micro', 't4g.micro']);
    expect(recommendations[0].reasoning[2]).toBe(
      'Alternative: consider t4g.micro for ARM compatibility (~20% additional savings)',
    );
  });

  it('applies the filter to targets', () => {
    const { recommendations } = generator().generate({
      targetResources: [target('ec2', 'm5.large', { env: 'dev' }), target('ec2', 'm5.large', { env: 'prod' })],
      filter: { tags: { env: 'prod' } },
    });
    expect(recommendations).toHaveLength(2);
  });

  it('returns an empty summary when nothing applies', () => {
    const { recommendations, summary } = generator().generate({ targetResources: [target('lambda', '512')] });
    expect(recommendations).toEqual([]);
    expect(summary).toEqual({
      totalRecommendations: 0,
      totalEstimatedSavings: 0,
      currency: 'USD',
      projectionPeriod: 'monthly',
      countByCategory: {},
      countByActionType: {},
    });
  });

  it('skips other providers unless validation is strict', () => {
    const foreign = { ...target('ec2', 'm5.large'), provider: 'gcp' };
    expect(generator().generate({ targetResources: [foreign] }).recommendations).toEqual([]);
    expect(() => generator({ strictValidation: true }).generate({ targetResources: [foreign] })).toThrow(
      'strict validation: unsupported provider "gcp" (only "aws" supported)',
    );
  });

  it('rejects unsupported services under strict validation', () => {
    expect(() => generator({ strictValidation: true }).generate({ targetResources: [target('lambda', '512')] })).toThrow(
      'strict validation: service "lambda" does not support recommendations (resource_type: lambda)',
    );
  });

  it('rejects oversized batches and missing requests', () => {
    const small = generator({ maxBatchSize: 2 });
    const targets = [target('ec2', 'm5.large'), target('ec2', 'm5.large'), target('ec2', 'm5.large')];
    expect(() => small.generate({ targetResources: targets })).toThrow('batch size 3 exceeds maximum of 2');
    expect(() => small.generate(undefined)).toThrow(InvalidRequestError);
  });
});

describe('RecommendationGenerator with pricier candidates', () => {
  it('skips a generation upgrade that costs more than the current type', () => {
    const source = new RepricedSource({ 'm5.large': 0.096, 'm6i.large': 0.2, 'm6g.large': 0.077 });
    const { recommendations } = repricedGenerator(source).generate({ targetResources: [target('ec2', 'm5.large')] });

    expect(recommendations.map(r => r.modificationType)).toEqual(['graviton_migration']);
    expect(recommendations[0].recommendedConfig.instance_type).toBe('m6g.large');
  });

  it('emits nothing when every mapped candidate costs more', () => {
    const source = new RepricedSource({ 'm5.large': 0.096, 'm6i.large': 0.2, 'm6g.large': 0.1 });
    const { recommendations, summary } = repricedGenerator(source).generate({ targetResources: [target('ec2', 'm5.large')] });

    expect(recommendations).toEqual([]);
    expect(summary.totalRecommendations).toBe(0);
  });

  it('skips gp2 to gp3 when gp3 is the pricier volume type', () => {
    const source = new RepricedSource({}, { gp2: 0.1, gp3: 0.15 });
    const { recommendations } = repricedGenerator(source).generate({
      targetResources: [target('ebs', 'gp2', { size: '100' })],
    });

    expect(recommendations).toEqual([]);
  });
});

describe('filter helpers', () => {
  it('normalizes resource types on both sides', () => {
    expect(matchesFilter(target('aws:ec2/instance:Instance', 'm5.large'), { resourceType: 'ec2' })).toBe(true);
    expect(matchesFilter(target('ec2', 'm5.large'), { region: 'eu-west-1' })).toBe(false);
    expect(matchesFilter(target('ec2', 'm5.large'), { sku: 'm5.xlarge' })).toBe(false);
  });

  it('does not synthesize a target without a SKU', () => {
    expect(normalizeInput({ filter: { resourceType: 'ec2' } }).targets).toEqual([]);
  });
});
