/**
 * Input Loader
 * Reads request documents from JSON or YAML files (or glob patterns) and
 * validates them into engine request types.
 */

import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import * as yaml from 'yaml';
import { z } from 'zod';
import { parseRfc3339 } from './timestamp-resolver';
import type {
  ActualCostRequest,
  AttributeValue,
  EstimateCostRequest,
  RecommendationFilter,
  RecommendationsRequest,
  ResourceDescriptor,
} from './types';

// Tag maps accept scalar values; the engine only sees strings
const tagMapSchema = z.record(
  z.string(),
  z.union([z.string(), z.number(), z.boolean()]).transform(value => String(value)),
);

const resourceSchema = z
  .object({
    provider: z.string().default('aws'),
    resource_type: z.string().optional(),
    resourceType: z.string().optional(),
    sku: z.string().default(''),
    region: z.string().default(''),
    tags: tagMapSchema.default({}),
    id: z.string().optional(),
    name: z.string().optional(),
    utilization_percentage: z.number().optional(),
    utilizationPercentage: z.number().optional(),
  })
  .transform((raw): ResourceDescriptor => {
    const resource: ResourceDescriptor = {
      provider: raw.provider,
      resourceType: raw.resource_type ?? raw.resourceType ?? '',
      sku: raw.sku,
      region: raw.region,
      tags: raw.tags,
    };
    if (raw.id !== undefined) resource.id = raw.id;
    if (raw.name !== undefined) resource.name = raw.name;
    const utilization = raw.utilization_percentage ?? raw.utilizationPercentage;
    if (utilization !== undefined) resource.utilizationPercentage = utilization;
    return resource;
  });

const timestampSchema = z.string().transform((value, ctx): Date => {
  const parsed = parseRfc3339(value);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be an RFC 3339 timestamp' });
    return z.NEVER;
  }
  return parsed;
});

const resourceIdSchema = z.union([z.string(), resourceSchema]).transform(value =>
  typeof value === 'string' ? value : JSON.stringify(value),
);

const actualCostSchema = z
  .object({
    resource_id: resourceIdSchema.optional(),
    resourceId: resourceIdSchema.optional(),
    arn: z.string().optional(),
    tags: tagMapSchema.optional(),
    start: timestampSchema.optional(),
    end: timestampSchema.optional(),
  })
  .transform((raw): ActualCostRequest => ({
    resourceId: raw.resource_id ?? raw.resourceId,
    arn: raw.arn,
    tags: raw.tags,
    start: raw.start,
    end: raw.end,
  }));

const filterSchema = z
  .object({
    region: z.string().optional(),
    resource_type: z.string().optional(),
    resourceType: z.string().optional(),
    sku: z.string().optional(),
    tags: tagMapSchema.optional(),
  })
  .transform((raw): RecommendationFilter => ({
    region: raw.region,
    resourceType: raw.resource_type ?? raw.resourceType,
    sku: raw.sku,
    tags: raw.tags,
  }));

const recommendationsSchema = z.union([
  z.array(resourceSchema).transform((targetResources): RecommendationsRequest => ({ targetResources })),
  z
    .object({
      target_resources: z.array(resourceSchema).optional(),
      targetResources: z.array(resourceSchema).optional(),
      resources: z.array(resourceSchema).optional(),
      filter: filterSchema.optional(),
    })
    .transform((raw): RecommendationsRequest => ({
      targetResources: raw.target_resources ?? raw.targetResources ?? raw.resources,
      filter: raw.filter,
    })),
]);

const attributeSchema: z.ZodType<AttributeValue> = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const estimateSchema = z
  .object({
    resource_type: z.string().optional(),
    resourceType: z.string().optional(),
    attributes: z.record(z.string(), attributeSchema).default({}),
  })
  .transform((raw): EstimateCostRequest => ({
    resourceType: raw.resource_type ?? raw.resourceType ?? '',
    attributes: raw.attributes,
  }));

export class InputLoader {
  /**
   * Expand file paths and glob patterns into a sorted, de-duplicated file list
   */
  static async resolvePaths(patterns: string[]): Promise<string[]> {
    const files = new Set<string>();

    for (const pattern of patterns) {
      if (fs.existsSync(pattern)) {
        files.add(path.resolve(pattern));
        continue;
      }

      const matches = await glob(pattern, { nodir: true, absolute: true });
      if (matches.length === 0) {
        throw new Error(`No input files match ${pattern}`);
      }
      for (const match of matches) files.add(match);
    }

    return [...files].sort();
  }

  /**
   * Parse a document from a file path
   */
  static parseFile(filePath: string): unknown {
    const absolutePath = path.resolve(filePath);

    if (!fs.existsSync(absolutePath)) {
      throw new Error(`Input file not found: ${absolutePath}`);
    }

    const content = fs.readFileSync(absolutePath, 'utf-8');
    return this.parseContent(content, filePath);
  }

  /**
   * Parse a document from string content, JSON first and then YAML
   */
  static parseContent(content: string, sourceName: string = 'input'): unknown {
    try {
      return JSON.parse(content);
    } catch {
      try {
        return yaml.parse(content);
      } catch (yamlError) {
        throw new Error(`Failed to parse ${sourceName} as JSON or YAML: ${yamlError}`);
      }
    }
  }

  static parseResources(document: unknown, sourceName: string = 'input'): ResourceDescriptor[] {
    return this.entries(document).map(entry => this.validate(resourceSchema, entry, 'resource', sourceName));
  }

  static parseActualCostRequests(document: unknown, sourceName: string = 'input'): ActualCostRequest[] {
    return this.entries(document).map(entry => this.validate(actualCostSchema, entry, 'actual cost request', sourceName));
  }

  static parseRecommendationsRequest(document: unknown, sourceName: string = 'input'): RecommendationsRequest {
    return this.validate(recommendationsSchema, document, 'recommendations request', sourceName);
  }

  static parseEstimateRequests(document: unknown, sourceName: string = 'input'): EstimateCostRequest[] {
    return this.entries(document).map(entry => this.validate(estimateSchema, entry, 'estimate request', sourceName));
  }

  static async loadResources(patterns: string[]): Promise<ResourceDescriptor[]> {
    const files = await this.resolvePaths(patterns);
    return files.flatMap(file => this.parseResources(this.parseFile(file), file));
  }

  static async loadActualCostRequests(patterns: string[]): Promise<ActualCostRequest[]> {
    const files = await this.resolvePaths(patterns);
    return files.flatMap(file => this.parseActualCostRequests(this.parseFile(file), file));
  }

  /**
   * Merge every file into one request: targets are concatenated, the last filter wins
   */
  static async loadRecommendationsRequest(patterns: string[]): Promise<RecommendationsRequest> {
    const files = await this.resolvePaths(patterns);
    const merged: RecommendationsRequest = {};

    for (const file of files) {
      const request = this.parseRecommendationsRequest(this.parseFile(file), file);
      if (request.targetResources) {
        merged.targetResources = [...(merged.targetResources ?? []), ...request.targetResources];
      }
      if (request.filter) merged.filter = request.filter;
    }

    return merged;
  }

  static async loadEstimateRequests(patterns: string[]): Promise<EstimateCostRequest[]> {
    const files = await this.resolvePaths(patterns);
    return files.flatMap(file => this.parseEstimateRequests(this.parseFile(file), file));
  }

  /**
   * A document holds one entry, a list of entries, or { resources: [...] }
   */
  private static entries(document: unknown): unknown[] {
    if (Array.isArray(document)) return document;
    const wrapped = z.object({ resources: z.array(z.unknown()) }).safeParse(document);
    return wrapped.success ? wrapped.data.resources : [document];
  }

  private static validate<Output>(
    schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
    value: unknown,
    what: string,
    sourceName: string,
  ): Output {
    const result = schema.safeParse(value);
    if (!result.success) {
      const first = result.error.issues[0];
      const location = first.path.length > 0 ? `${first.path.join('.')}: ` : '';
      throw new Error(`Invalid ${what} in ${sourceName}: ${location}${first.message}`);
    }
    return result.data;
  }
}
