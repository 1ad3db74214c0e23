/**
 * Request Validator
 * Checks descriptors against the engine's region and builds the resource
 * for actual-cost requests from an ARN, a JSON resource id or tags.
 */

import { z } from 'zod';
import { arnResourceType, parseArn } from './arn';
import { TagAttributes, extractRegion, extractSku, skuTagKeys } from './attribute-extractor';
import { InvalidRequestError, RegionMismatchError, errorMessage } from './errors';
import type { Logger } from './logger';
import { ResolutionCache, isGlobalService, resolveResourceType } from './resource-resolver';
import type { ActualCostRequest, ResourceDescriptor, ResourceIdentity } from './types';

export const AWS_PROVIDER = 'aws';

export interface ValidatedResource {
  /** The descriptor with its effective region filled in */
  resource: ResourceDescriptor;
  identity: ResourceIdentity;
}

const descriptorJsonSchema = z.object({
  provider: z.string().optional(),
  resource_type: z.string().optional(),
  resourceType: z.string().optional(),
  sku: z.string().optional(),
  region: z.string().optional(),
  tags: z.record(z.string(), z.string()).optional(),
  id: z.string().optional(),
  name: z.string().optional(),
});

const taggedJsonSchema = z.object({ tags: z.record(z.string(), z.string()) });

// Tags that describe the resource itself rather than annotate it
const DESCRIPTOR_TAG_KEYS = new Set(['provider', 'resource_type', 'sku', 'region']);

export class RequestValidator {
  private readonly region: string;
  private readonly logger: Logger;

  constructor(region: string, logger: Logger) {
    this.region = region;
    this.logger = logger;
  }

  /**
   * Validate a descriptor for projected cost, pricing spec or estimation
   */
  validateDescriptor(
    resource: ResourceDescriptor | undefined,
    traceId: string,
    resolver: ResolutionCache = new ResolutionCache(),
  ): ValidatedResource {
    if (!resource) {
      throw new InvalidRequestError('resource is required', traceId);
    }
    if (!resource.provider) {
      throw new InvalidRequestError('provider is required', traceId);
    }
    if (resource.provider !== AWS_PROVIDER) {
      throw new InvalidRequestError(`only "${AWS_PROVIDER}" provider is supported`, traceId);
    }
    if (!resource.resourceType) {
      throw new InvalidRequestError('resource_type is required', traceId);
    }

    const identity = resolver.resolve(resource.resourceType);
    const region = this.effectiveRegion(resource.region, identity);
    if (region !== this.region) {
      throw new RegionMismatchError(this.region, region, traceId);
    }

    return { resource: { ...resource, region }, identity };
  }

  /**
   * Resolve the resource an actual-cost request refers to, in priority
   * order: ARN plus tags, JSON resource id, then tags alone
   */
  resolveActualCostResource(request: ActualCostRequest, traceId: string): ValidatedResource {
    if (request.arn) {
      return this.resourceFromArn(request.arn, request.tags ?? {}, traceId);
    }

    const resource = this.resourceFromJson(request.resourceId) ?? this.resourceFromTags(request.tags, traceId);
    const identity = resolveResourceType(resource.resourceType);
    const region = this.effectiveRegion(resource.region, identity);
    if (region !== resource.region) {
      this.logger.debug({ resourceType: resource.resourceType, assignedRegion: region }, 'assigned engine region to global service');
    }
    if (region !== this.region) {
      throw new RegionMismatchError(this.region, region, traceId);
    }

    return { resource: { ...resource, region }, identity };
  }

  private effectiveRegion(region: string, identity: ResourceIdentity): string {
    return region === '' && isGlobalService(identity.serviceCode) ? this.region : region;
  }

  private resourceFromArn(arn: string, tags: Readonly<Record<string, string>>, traceId: string): ValidatedResource {
    let resource: ResourceDescriptor;
    try {
      const components = parseArn(arn);
      const sku = tags.sku || extractSku(new TagAttributes(tags, this.logger));
      if (!sku) {
        throw new Error(`ARN provided (${arn}) but tags missing 'sku' (instance type, volume type, etc.)`);
      }
      resource = {
        provider: AWS_PROVIDER,
        resourceType: arnResourceType(components),
        sku,
        region: components.region,
        tags: omitKeys(tags, new Set(['sku', ...skuTagKeys()])),
      };
    } catch (error) {
      throw new InvalidRequestError(`failed to parse ARN ${JSON.stringify(arn)}: ${errorMessage(error)}`, traceId);
    }

    const identity = resolveResourceType(resource.resourceType);
    const region = this.effectiveRegion(resource.region, identity);
    // An ARN without a region only pins the region for global services
    if (region !== '' && region !== this.region) {
      throw new RegionMismatchError(this.region, region, traceId);
    }

    return { resource: { ...resource, region }, identity };
  }

  private resourceFromJson(resourceId: string | undefined): ResourceDescriptor | undefined {
    if (!resourceId) return undefined;

    const raw = parseJson(resourceId);
    if (raw === undefined) {
      this.logger.debug({ resourceId }, 'resource id is not JSON; falling back to tags');
      return undefined;
    }

    const parsed = descriptorJsonSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.debug({ resourceId }, 'resource id JSON is not a descriptor; falling back to tags');
      return undefined;
    }

    const json = parsed.data;
    return {
      provider: json.provider ?? '',
      resourceType: json.resource_type ?? json.resourceType ?? '',
      sku: json.sku ?? '',
      region: json.region ?? '',
      tags: json.tags ?? {},
      id: json.id,
      name: json.name,
    };
  }

  private resourceFromTags(tags: Readonly<Record<string, string>> | undefined, traceId: string): ResourceDescriptor {
    if (!tags) {
      throw new InvalidRequestError('missing resource information: provide ResourceId as JSON or use Tags', traceId);
    }

    const reader = new TagAttributes(tags, this.logger);
    const resource: ResourceDescriptor = {
      provider: tags.provider ?? '',
      resourceType: tags.resource_type ?? '',
      sku: tags.sku || extractSku(reader),
      region: extractRegion(reader),
      tags: omitKeys(tags, DESCRIPTOR_TAG_KEYS),
    };

    if (!resource.provider || !resource.resourceType || !resource.sku || !resource.region) {
      throw new InvalidRequestError(
        'resource information incomplete: need provider, resource_type, sku, region in ResourceId or Tags',
        traceId,
      );
    }
    return resource;
  }
}

/**
 * Tags from a JSON resource id overlaid with the request's own tags
 */
export function mergeRequestTags(request: ActualCostRequest): Record<string, string> {
  const parsed = taggedJsonSchema.safeParse(request.resourceId ? parseJson(request.resourceId) : undefined);
  return { ...(parsed.success ? parsed.data.tags : {}), ...request.tags };
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function omitKeys(tags: Readonly<Record<string, string>>, keys: ReadonlySet<string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(tags)) {
    if (!keys.has(key)) result[key] = value;
  }
  return result;
}
