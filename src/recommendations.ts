/**
 * Recommendations
 * Rightsizing suggestions from public pricing: newer instance generations,
 * Graviton (arm64) equivalents and gp2 to gp3 volume migrations.
 */

import { randomUUID } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { InvalidRequestError, newTraceId } from './errors';
import type { Logger } from './logger';
import { HOURS_PER_MONTH, type PricingSource } from './pricing-data';
import { PRICING_SOURCE } from './pricing-spec';
import { AWS_PROVIDER } from './request-validator';
import { ResolutionCache, normalizeResourceType } from './resource-resolver';
import type {
  ModificationType,
  Recommendation,
  RecommendationFilter,
  RecommendationImpact,
  RecommendationPriority,
  RecommendationsRequest,
  RecommendationsResponse,
  ResourceDescriptor,
} from './types';

const DEFAULT_EBS_SIZE_GB = 100;

const upgradePathsSchema = z.object({
  ec2Generation: z.record(z.string(), z.string()),
  ec2Graviton: z.record(z.string(), z.string()),
  rdsGeneration: z.record(z.string(), z.string()),
  rdsGraviton: z.record(z.string(), z.string()),
  rdsGravitonEngines: z.array(z.string()),
});

export type UpgradePaths = z.infer<typeof upgradePathsSchema>;

export interface RecommendationOptions {
  region: string;
  maxBatchSize: number;
  strictValidation: boolean;
}

export interface InstanceTypeParts {
  family: string;
  size: string;
}

/**
 * Location of the bundled upgrade-path table, from either src/ or dist/src/
 */
export function upgradePathsFile(): string {
  const candidates = [
    path.resolve(__dirname, '..', 'data', 'upgrade-paths.json'),
    path.resolve(__dirname, '..', '..', 'data', 'upgrade-paths.json'),
  ];
  return candidates.find(file => fs.existsSync(file)) ?? candidates[0];
}

export function loadUpgradePaths(file: string = upgradePathsFile()): UpgradePaths {
  const result = upgradePathsSchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf-8')));
  if (!result.success) {
    const first = result.error.issues[0];
    throw new Error(`Invalid upgrade paths in ${file}: ${first.path.join('.')}: ${first.message}`);
  }
  return result.data;
}

/**
 * Split "m5.large" into family and size
 */
export function parseInstanceType(instanceType: string): InstanceTypeParts | undefined {
  const dot = instanceType.indexOf('.');
  if (dot <= 0 || dot === instanceType.length - 1) return undefined;
  return { family: instanceType.slice(0, dot), size: instanceType.slice(dot + 1) };
}

/**
 * Split "db.m5.large" into family "db.m5" and size "large"
 */
export function parseRDSInstanceType(instanceType: string): InstanceTypeParts | undefined {
  if (!instanceType.startsWith('db.')) return undefined;
  const parts = parseInstanceType(instanceType.slice('db.'.length));
  return parts ? { family: `db.${parts.family}`, size: parts.size } : undefined;
}

export function normalizeRDSEngine(engine: string): string {
  const lowered = engine.trim().toLowerCase();
  switch (lowered) {
    case 'mysql':
    case 'mysql8':
    case 'mysql-8.0':
      return 'mysql';
    case 'postgres':
    case 'postgresql':
    case 'postgres13':
    case 'postgres14':
    case 'postgres15':
      return 'postgresql';
    case 'mariadb':
    case 'maria':
      return 'mariadb';
    case 'aurora':
    case 'aurora-mysql':
      return 'aurora-mysql';
    case 'aurora-postgresql':
      return 'aurora-postgresql';
  }
  if (lowered.startsWith('oracle')) return 'oracle';
  if (lowered.startsWith('sqlserver') || lowered.startsWith('sql-server')) return 'sqlserver';
  return lowered;
}

export function impactOf(currentCost: number, projectedCost: number): RecommendationImpact {
  const estimatedSavings = currentCost - projectedCost;
  return {
    estimatedSavings,
    savingsPercentage: currentCost > 0 ? (estimatedSavings / currentCost) * 100 : 0,
    currency: 'USD',
    projectionPeriod: 'monthly',
    currentCost,
    projectedCost,
  };
}

interface RecommendationDraft {
  modificationType: ModificationType;
  currentConfig: Record<string, string>;
  recommendedConfig: Record<string, string>;
  impact: RecommendationImpact;
  priority: RecommendationPriority;
  confidenceScore: number;
  description: string;
  reasoning: string[];
  metadata?: Record<string, string>;
}

export class RecommendationGenerator {
  private readonly pricing: PricingSource;
  private readonly options: RecommendationOptions;
  private readonly logger: Logger;
  private readonly paths: UpgradePaths;

  constructor(pricing: PricingSource, options: RecommendationOptions, logger: Logger, paths: UpgradePaths = loadUpgradePaths()) {
    this.pricing = pricing;
    this.options = options;
    this.logger = logger;
    this.paths = paths;
  }

  /**
   * Recommendations for every target that passes the filter
   */
  generate(request: RecommendationsRequest | undefined, traceId: string = newTraceId()): RecommendationsResponse {
    if (!request) {
      throw new InvalidRequestError('missing request', traceId);
    }

    const count = request.targetResources?.length ?? 0;
    if (count > this.options.maxBatchSize) {
      throw new InvalidRequestError(`batch size ${count} exceeds maximum of ${this.options.maxBatchSize}`, traceId);
    }

    const { targets, filter } = normalizeInput(request);
    const resolver = new ResolutionCache();
    const recommendations: Recommendation[] = [];

    for (const resource of targets) {
      if (resource.provider && resource.provider !== AWS_PROVIDER) {
        if (this.options.strictValidation) {
          throw new InvalidRequestError(
            `strict validation: unsupported provider "${resource.provider}" (only "${AWS_PROVIDER}" supported)`,
            traceId,
          );
        }
        this.logger.debug({ traceId, provider: resource.provider }, 'skipping resource from another provider');
        continue;
      }
      if (filter && !matchesFilter(resource, filter)) continue;

      recommendations.push(...this.recommendFor(resource, resolver.resolve(resource.resourceType).serviceCode, traceId));
    }

    return { recommendations, summary: this.summarize(recommendations, traceId) };
  }

  private recommendFor(resource: ResourceDescriptor, service: string, traceId: string): Recommendation[] {
    let drafts: RecommendationDraft[];
    switch (service) {
      case 'ec2':
        drafts = this.ec2Recommendations(resource.sku);
        break;
      case 'ebs':
        drafts = this.ebsRecommendations(resource);
        break;
      case 'rds':
        drafts = this.rdsRecommendations(resource);
        break;
      default:
        if (this.options.strictValidation) {
          throw new InvalidRequestError(
            `strict validation: service "${service}" does not support recommendations (resource_type: ${resource.resourceType})`,
            traceId,
          );
        }
        this.logger.debug({ traceId, service, resourceType: resource.resourceType }, 'no recommendations for service');
        return [];
    }

    const region = resource.region || this.options.region;
    const id = resource.id?.trim() || resource.tags.resource_id;
    const name = resource.name ?? resource.tags.name;

    return drafts.map((draft): Recommendation => ({
      id: randomUUID(),
      category: 'cost',
      actionType: 'modify',
      resource: {
        provider: AWS_PROVIDER,
        resourceType: resource.resourceType,
        region,
        sku: resource.sku,
        ...(id ? { id } : {}),
        ...(name ? { name } : {}),
      },
      modificationType: draft.modificationType,
      currentConfig: draft.currentConfig,
      recommendedConfig: draft.recommendedConfig,
      impact: draft.impact,
      priority: draft.priority,
      confidenceScore: draft.confidenceScore,
      description: draft.description,
      reasoning: draft.reasoning,
      metadata: draft.metadata ?? {},
      source: PRICING_SOURCE,
    }));
  }

  private ec2Recommendations(instanceType: string): RecommendationDraft[] {
    const parts = parseInstanceType(instanceType);
    if (!parts) return [];

    const current = this.pricing.ec2OnDemandPrice(instanceType, 'Linux', 'Shared');
    if (!current.found) return [];
    const currentMonthly = current.rate * HOURS_PER_MONTH;
    const drafts: RecommendationDraft[] = [];

    const nextFamily = this.paths.ec2Generation[parts.family];
    if (nextFamily) {
      const nextType = `${nextFamily}.${parts.size}`;
      const next = this.pricing.ec2OnDemandPrice(nextType, 'Linux', 'Shared');
      if (next.found && next.rate <= current.rate) {
        const reasoning = [
          `Newer ${nextFamily} instances offer better performance`,
          'Drop-in replacement with no architecture changes required',
        ];
        const graviton = this.paths.ec2Graviton[nextFamily];
        if (graviton) {
          reasoning.push(`Alternative: consider ${graviton}.${parts.size} for ARM compatibility (~20% additional savings)`);
        }
        drafts.push({
          modificationType: 'generation_upgrade',
          currentConfig: { instance_type: instanceType },
          recommendedConfig: { instance_type: nextType },
          impact: impactOf(currentMonthly, next.rate * HOURS_PER_MONTH),
          priority: 'MEDIUM',
          confidenceScore: 0.9,
          description: `Upgrade from ${instanceType} to ${nextType} for better performance at same or lower cost`,
          reasoning,
        });
      }
    }

    const gravitonFamily = this.paths.ec2Graviton[parts.family];
    if (gravitonFamily) {
      const gravitonType = `${gravitonFamily}.${parts.size}`;
      const graviton = this.pricing.ec2OnDemandPrice(gravitonType, 'Linux', 'Shared');
      if (graviton.found && graviton.rate <= current.rate) {
        const impact = impactOf(currentMonthly, graviton.rate * HOURS_PER_MONTH);
        drafts.push({
          modificationType: 'graviton_migration',
          currentConfig: { instance_type: instanceType, architecture: 'x86_64' },
          recommendedConfig: { instance_type: gravitonType, architecture: 'arm64' },
          impact,
          priority: 'LOW',
          confidenceScore: 0.7,
          description: `Migrate from ${instanceType} to ${gravitonType} (Graviton) for ~${impact.savingsPercentage.toFixed(0)}% cost savings`,
          reasoning: [
            'Graviton instances are typically ~20% cheaper with comparable performance',
            'Requires validation that application supports ARM architecture',
          ],
          metadata: {
            architecture_change: 'x86_64 -> arm64',
            requires_validation: 'Application must support ARM architecture',
          },
        });
      }
    }

    return drafts;
  }

  private ebsRecommendations(resource: ResourceDescriptor): RecommendationDraft[] {
    if (resource.sku.toLowerCase() !== 'gp2') return [];

    const sizeGb = positiveInteger(resource.tags.size) ?? positiveInteger(resource.tags.volume_size) ?? DEFAULT_EBS_SIZE_GB;
    const gp2 = this.pricing.ebsPricePerGBMonth('gp2');
    const gp3 = this.pricing.ebsPricePerGBMonth('gp3');
    if (!gp2.found || !gp3.found || gp3.rate > gp2.rate) return [];

    const impact = impactOf(gp2.rate * sizeGb, gp3.rate * sizeGb);
    return [
      {
        modificationType: 'volume_type_upgrade',
        currentConfig: { volume_type: 'gp2', size_gb: String(sizeGb) },
        recommendedConfig: { volume_type: 'gp3', size_gb: String(sizeGb) },
        impact,
        priority: 'MEDIUM',
        confidenceScore: 0.9,
        description: `Upgrade ${sizeGb}GB gp2 volume to gp3 for ~${impact.savingsPercentage.toFixed(0)}% cost savings`,
        reasoning: [
          'gp3 volumes are ~20% cheaper than gp2',
          'gp3 provides better baseline performance (3000 IOPS, 125 MB/s)',
          'API-compatible change with no data migration required',
        ],
        metadata: {
          baseline_iops: 'gp2: 100 IOPS/GB, gp3: 3000 IOPS (included)',
          baseline_throughput: 'gp2: 128-250 MB/s, gp3: 125 MB/s (included)',
        },
      },
    ];
  }

  private rdsRecommendations(resource: ResourceDescriptor): RecommendationDraft[] {
    const instanceType = resource.sku;
    const parts = parseRDSInstanceType(instanceType);
    if (!parts) return [];

    const rawEngine = resource.tags.engine ?? resource.tags.Engine;
    const engine = rawEngine ? normalizeRDSEngine(rawEngine) : 'mysql';
    const gravitonCapable = this.paths.rdsGravitonEngines.includes(engine);

    const current = this.pricing.rdsOnDemandPrice(instanceType, engine);
    if (!current.found) return [];
    const currentMonthly = current.rate * HOURS_PER_MONTH;
    const drafts: RecommendationDraft[] = [];

    const nextFamily = this.paths.rdsGeneration[parts.family];
    if (nextFamily) {
      const nextType = `${nextFamily}.${parts.size}`;
      const next = this.pricing.rdsOnDemandPrice(nextType, engine);
      if (next.found && next.rate <= current.rate) {
        const reasoning = [
          `Newer ${nextFamily} instances offer better performance for ${engine}`,
          'Drop-in replacement with no architecture changes required',
        ];
        const graviton = this.paths.rdsGraviton[nextFamily];
        if (graviton && gravitonCapable) {
          reasoning.push(`Alternative: consider ${graviton}.${parts.size} for ARM compatibility (~20% additional savings)`);
        }
        drafts.push({
          modificationType: 'generation_upgrade',
          currentConfig: { instance_type: instanceType, engine },
          recommendedConfig: { instance_type: nextType, engine },
          impact: impactOf(currentMonthly, next.rate * HOURS_PER_MONTH),
          priority: 'MEDIUM',
          confidenceScore: 0.9,
          description: `Upgrade RDS ${engine} from ${instanceType} to ${nextType} for better performance at same or lower cost`,
          reasoning,
        });
      }
    }

    const gravitonFamily = this.paths.rdsGraviton[parts.family];
    if (gravitonFamily && gravitonCapable) {
      const gravitonType = `${gravitonFamily}.${parts.size}`;
      const graviton = this.pricing.rdsOnDemandPrice(gravitonType, engine);
      if (graviton.found && graviton.rate <= current.rate) {
        const impact = impactOf(currentMonthly, graviton.rate * HOURS_PER_MONTH);
        drafts.push({
          modificationType: 'graviton_migration',
          currentConfig: { instance_type: instanceType, engine, architecture: 'x86_64' },
          recommendedConfig: { instance_type: gravitonType, engine, architecture: 'arm64' },
          impact,
          priority: 'LOW',
          confidenceScore: 0.7,
          description: `Migrate RDS ${engine} from ${instanceType} to ${gravitonType} (Graviton) for ~${impact.savingsPercentage.toFixed(0)}% cost savings`,
          reasoning: [
            'Graviton RDS instances are typically ~20% cheaper with comparable performance',
            `Validated: ${engine} engine supports Graviton architecture`,
          ],
          metadata: { architecture_change: 'x86_64 -> arm64', engine },
        });
      }
    }

    return drafts;
  }

  private summarize(recommendations: Recommendation[], traceId: string): RecommendationsResponse['summary'] {
    let totalEstimatedSavings = 0;
    for (const recommendation of recommendations) {
      if (recommendation.impact) {
        totalEstimatedSavings += recommendation.impact.estimatedSavings;
      } else {
        this.logger.warn({ traceId, recommendationId: recommendation.id }, 'recommendation has no impact; excluded from savings');
      }
    }

    const total = recommendations.length;
    return {
      totalRecommendations: total,
      totalEstimatedSavings,
      currency: 'USD',
      projectionPeriod: 'monthly',
      countByCategory: total > 0 ? { cost: total } : {},
      countByActionType: total > 0 ? { modify: total } : {},
    };
  }
}

interface NormalizedInput {
  targets: ResourceDescriptor[];
  filter?: RecommendationFilter;
}

/**
 * Normalize resource types and expand a SKU-only filter into a single target
 */
export function normalizeInput(request: RecommendationsRequest): NormalizedInput {
  const filter = request.filter
    ? {
        ...request.filter,
        ...(request.filter.resourceType ? { resourceType: normalizeResourceType(request.filter.resourceType) } : {}),
      }
    : undefined;

  const targets = (request.targetResources ?? []).map(resource => ({
    ...resource,
    resourceType: normalizeResourceType(resource.resourceType),
  }));

  if (targets.length === 0 && filter?.sku) {
    targets.push({
      provider: AWS_PROVIDER,
      resourceType: filter.resourceType ?? '',
      sku: filter.sku,
      region: filter.region ?? '',
      tags: { ...filter.tags },
    });
  }

  return { targets, filter };
}

export function matchesFilter(resource: ResourceDescriptor, filter: RecommendationFilter): boolean {
  if (filter.region && resource.region !== filter.region) return false;
  if (filter.resourceType && normalizeResourceType(resource.resourceType) !== normalizeResourceType(filter.resourceType)) {
    return false;
  }
  if (filter.sku && resource.sku !== filter.sku) return false;
  for (const [key, value] of Object.entries(filter.tags ?? {})) {
    if (resource.tags[key] !== value) return false;
  }
  return true;
}

function positiveInteger(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) return undefined;
  const parsed = parseInt(value.trim(), 10);
  return parsed > 0 ? parsed : undefined;
}
