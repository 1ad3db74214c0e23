/**
 * Cost Engine
 * Single-region entry point: validates requests, resolves the resource and
 * dispatches to the calculators, pricing-spec builder and recommender.
 */

import {
  StructuredAttributes,
  TagAttributes,
  extractRegion,
  extractSku,
  type AttributeReader,
} from './attribute-extractor';
import { resolveConfig, type EngineConfig } from './config';
import { CostCalculator, resolveUtilization, zeroEstimate, type CarbonEstimator } from './cost-calculator';
import { InvalidRequestError, errorMessage, newTraceId } from './errors';
import { componentLogger, sanitizeTagsForLogging, silentLogger, type Logger } from './logger';
import { EmbeddedPricingSource, HOURS_PER_MONTH, type PricingSource } from './pricing-data';
import { PricingSpecBuilder } from './pricing-spec';
import { RecommendationGenerator } from './recommendations';
import { AWS_PROVIDER, RequestValidator, mergeRequestTags } from './request-validator';
import { ResolutionCache, resolveResourceType } from './resource-resolver';
import { buildFocusRecord, growthType, pricingUnit } from './service-metadata';
import { checkSupport } from './supports';
import {
  TimestampResolutionError,
  determineConfidence,
  formatSourceWithConfidence,
  resolveTimestamps,
  runtimeHours,
} from './timestamp-resolver';
import type {
  ActualCostRequest,
  ActualCostResult,
  CostEstimate,
  EstimateCostRequest,
  PricingSpec,
  PricingSpecRequest,
  ProjectedCostRequest,
  RecommendationsRequest,
  RecommendationsResponse,
  ResourceDescriptor,
  ResourceIdentity,
  SupportsRequest,
  SupportsResult,
  TimestampResolution,
} from './types';

export const ACTUAL_COST_SOURCE = 'aws-public-fallback';

export interface CostEngineOptions {
  config?: EngineConfig;
  /** Defaults to the bundled price list for the configured region */
  pricing?: PricingSource;
  logger?: Logger;
  carbon?: CarbonEstimator;
  /** Clock used when an actual-cost window has no end */
  now?: () => Date;
}

export interface VendorResourceType {
  provider: string;
  module: string;
  resource: string;
}

/**
 * Parse "aws:ec2/instance:Instance" into provider, module and resource type name
 */
export function parseVendorResourceType(resourceType: string): VendorResourceType {
  const colon = resourceType.indexOf(':');
  if (colon < 0) {
    throw new Error("invalid format: expected 'provider:module/resource:Type'");
  }
  const rest = resourceType.slice(colon + 1);
  const slash = rest.indexOf('/');
  if (slash < 0) {
    throw new Error('invalid format: expected module/resource:Type');
  }
  const resourcePart = rest.slice(slash + 1);
  const typeColon = resourcePart.indexOf(':');
  if (typeColon < 0) {
    throw new Error('invalid format: expected resource:Type');
  }

  return {
    provider: resourceType.slice(0, colon),
    module: rest.slice(0, slash),
    resource: resourcePart.slice(typeColon + 1),
  };
}

export class CostEngine {
  readonly config: EngineConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly validator: RequestValidator;
  private readonly calculator: CostCalculator;
  private readonly specBuilder: PricingSpecBuilder;
  private readonly recommender: RecommendationGenerator;

  constructor(options: CostEngineOptions = {}) {
    this.config = options.config ?? resolveConfig({}).config;
    this.logger = componentLogger(options.logger ?? silentLogger(), 'cost-engine');
    this.now = options.now ?? (() => new Date());

    const pricing = options.pricing ?? EmbeddedPricingSource.forRegion(this.config.region);
    if (pricing.region !== this.config.region) {
      throw new Error(`Pricing data is for ${pricing.region} but the engine is configured for ${this.config.region}`);
    }

    this.validator = new RequestValidator(this.config.region, this.logger);
    this.calculator = new CostCalculator(pricing, componentLogger(this.logger, 'calculator'), options.carbon);
    this.specBuilder = new PricingSpecBuilder(pricing, this.logger);
    this.recommender = new RecommendationGenerator(
      pricing,
      {
        region: this.config.region,
        maxBatchSize: this.config.maxBatchSize,
        strictValidation: this.config.strictValidation,
      },
      componentLogger(this.logger, 'recommendations'),
    );
  }

  get region(): string {
    return this.config.region;
  }

  /**
   * Projected monthly cost of a resource
   */
  getProjectedCost(request: ProjectedCostRequest): CostEstimate {
    const traceId = newTraceId();
    const { resource, identity } = this.validator.validateDescriptor(request.resource, traceId, new ResolutionCache());
    this.traceRequest('projected cost request', traceId, resource);

    const estimate = this.estimate(resource, identity, traceId, request.utilizationPercentage);
    const result: CostEstimate = { ...estimate, growthType: growthType(identity.serviceCode) };
    this.traceResult('projected cost result', traceId, result);
    return result;
  }

  /**
   * Cost accrued over a time window, prorated from the projected monthly cost
   */
  getActualCost(request: ActualCostRequest): ActualCostResult[] {
    const traceId = newTraceId();
    const resolution = this.resolveWindow(request, traceId);
    const { resource, identity } = this.validator.resolveActualCostResource(request, traceId);
    this.traceRequest('actual cost request', traceId, resource);

    const hours = runtimeHours(resolution);
    if (!Number.isFinite(hours)) {
      throw new InvalidRequestError('invalid time range: start and end must be valid timestamps', traceId);
    }
    if (hours < 0) {
      throw new InvalidRequestError(
        `invalid time range: from (${resolution.start.toISOString()}) is after to (${resolution.end.toISOString()})`,
        traceId,
      );
    }

    const source = formatSourceWithConfidence(ACTUAL_COST_SOURCE, determineConfidence(resolution), resolution.isImported);
    const focusBase = {
      serviceCode: identity.serviceCode,
      resourceType: resource.resourceType,
      resourceId: resource.id ?? request.arn ?? plainResourceId(request.resourceId),
      region: resource.region,
      sku: resource.sku,
      start: resolution.start,
      end: resolution.end,
    };

    if (hours === 0) {
      return [
        {
          timestamp: resolution.start,
          cost: 0,
          usageAmount: 0,
          usageUnit: 'hours',
          source,
          focusRecord: buildFocusRecord({
            ...focusBase,
            cost: 0,
            unitPrice: 0,
            pricingUnit: pricingUnit(identity.serviceCode),
            pricingQuantity: 0,
          }),
        },
      ];
    }

    const monthly = this.estimate(resource, identity, traceId);
    const cost = (monthly.monthlyCost * hours) / HOURS_PER_MONTH;
    const result: ActualCostResult = {
      timestamp: resolution.start,
      cost,
      usageAmount: hours,
      usageUnit: 'hours',
      source: `${source} | Fallback estimate: ${monthly.billingDetail} × ${hours.toFixed(2)} hours / 730 = $${cost.toFixed(4)}`,
      focusRecord: buildFocusRecord({
        ...focusBase,
        cost,
        unitPrice: monthly.unitPrice,
        pricingUnit: 'Hours',
        pricingQuantity: hours,
      }),
    };
    this.traceResult('actual cost result', traceId, { cost, hours });
    return [result];
  }

  /**
   * How a resource is billed, without computing a cost
   */
  getPricingSpec(request: PricingSpecRequest): PricingSpec {
    const traceId = newTraceId();
    const { resource, identity } = this.validator.validateDescriptor(request.resource, traceId, new ResolutionCache());
    this.traceRequest('pricing spec request', traceId, resource);
    return this.specBuilder.build(resource, identity);
  }

  getRecommendations(request: RecommendationsRequest | undefined): RecommendationsResponse {
    const traceId = newTraceId();
    if (this.config.testMode) {
      this.logger.debug(
        { traceId, targets: request?.targetResources?.length ?? 0, filter: request?.filter },
        'recommendations request',
      );
    }
    return this.recommender.generate(request, traceId);
  }

  supports(request: SupportsRequest): SupportsResult {
    const result = checkSupport(request.resource, this.config.region);
    this.logger.debug({ resourceType: request.resource?.resourceType, ...result }, 'supports check');
    return result;
  }

  /**
   * Monthly cost from a vendor resource type and its structured attributes
   */
  estimateCost(request: EstimateCostRequest): CostEstimate {
    const traceId = newTraceId();
    if (!request.resourceType) {
      throw new InvalidRequestError('missing resource_type', traceId);
    }

    let vendorType: VendorResourceType;
    try {
      vendorType = parseVendorResourceType(request.resourceType);
    } catch (error) {
      throw new InvalidRequestError(`invalid resource_type format: ${errorMessage(error)}`, traceId);
    }

    if (vendorType.provider !== AWS_PROVIDER) {
      return zeroEstimate(`Provider "${vendorType.provider}" not supported for estimation`);
    }

    const attributes = new StructuredAttributes(request.attributes ?? {}, this.logger);
    const region = extractRegion(attributes) || this.config.region;
    if (region !== this.config.region) {
      return zeroEstimate(
        `Resource region ${region} differs from engine region ${this.config.region}; estimate it with a ${region} engine`,
      );
    }

    const resource = this.resourceFromAttributes(vendorType, request.resourceType, region, attributes);
    if (typeof resource === 'string') {
      return zeroEstimate(resource);
    }

    const identity = resolveResourceType(resource.resourceType);
    const estimate = this.calculator.calculate(resource, {
      identity,
      attributes,
      utilization: resolveUtilization(),
      traceId,
    });
    const result: CostEstimate = { ...estimate, growthType: growthType(identity.serviceCode) };
    this.traceResult('estimate result', traceId, result);
    return result;
  }

  /**
   * The descriptor an attribute document describes, or why it cannot be priced
   */
  private resourceFromAttributes(
    vendorType: VendorResourceType,
    resourceType: string,
    region: string,
    attributes: AttributeReader,
  ): ResourceDescriptor | string {
    const base = { provider: AWS_PROVIDER, region, tags: {} };
    switch (vendorType.module) {
      case 'ec2': {
        if (vendorType.resource !== 'Instance') {
          return `Resource type "${resourceType}" not supported for estimation`;
        }
        const instanceType = attributes.getString('instanceType');
        if (!instanceType) {
          return 'EC2 instance missing instanceType attribute';
        }
        return { ...base, resourceType: 'ec2', sku: instanceType };
      }
      case 'ebs': {
        if (vendorType.resource !== 'Volume') {
          return `Resource type "${resourceType}" not supported for estimation`;
        }
        return { ...base, resourceType: 'ebs', sku: attributes.getString('type') ?? 'gp2' };
      }
      default:
        return `Resource type "${resourceType}" not supported for estimation`;
    }
  }

  private estimate(
    resource: ResourceDescriptor,
    identity: ResourceIdentity,
    traceId: string,
    requestUtilization?: number,
  ): CostEstimate {
    const attributes = new TagAttributes(resource.tags, this.logger);
    const priced = resource.sku ? resource : { ...resource, sku: extractSku(attributes) };
    return this.calculator.calculate(priced, {
      identity,
      attributes,
      utilization: resolveUtilization(requestUtilization, resource.utilizationPercentage),
      traceId,
    });
  }

  private resolveWindow(request: ActualCostRequest, traceId: string): TimestampResolution {
    try {
      return resolveTimestamps({ start: request.start, end: request.end, tags: mergeRequestTags(request) }, this.now);
    } catch (error) {
      if (error instanceof TimestampResolutionError) {
        throw new InvalidRequestError(error.message, traceId);
      }
      throw error;
    }
  }

  private traceRequest(message: string, traceId: string, resource: ResourceDescriptor): void {
    if (!this.config.testMode) return;
    this.logger.debug(
      {
        traceId,
        resourceType: resource.resourceType,
        sku: resource.sku,
        region: resource.region,
        tags: sanitizeTagsForLogging(resource.tags),
      },
      message,
    );
  }

  private traceResult(message: string, traceId: string, result: object): void {
    if (!this.config.testMode) return;
    this.logger.debug({ traceId, result }, message);
  }
}

function plainResourceId(resourceId: string | undefined): string | undefined {
  if (!resourceId || resourceId.trim().startsWith('{')) return undefined;
  return resourceId;
}
