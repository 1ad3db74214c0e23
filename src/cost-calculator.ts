/**
 * Cost Calculator
 * Calculates projected monthly costs for AWS resources, one calculator per service
 */

import {
  NUMERIC_PATTERN,
  type AttributeReader,
  extractCacheAttributes,
  extractComputeAttributes,
  extractDatabaseAttributes,
  extractFunctionAttributes,
  extractLoadBalancerAttributes,
  extractObjectStorageAttributes,
  extractTableAttributes,
  extractVolumeAttributes,
} from './attribute-extractor';
import { InvalidRequestError } from './errors';
import type { Logger } from './logger';
import { HOURS_PER_MONTH, type PricingSource } from './pricing-data';
import { calculateTieredCost, firstTierRate } from './tiered-cost';
import type { CostComponent, CostEstimate, ImpactMetric, ResourceDescriptor, ResourceIdentity, ServiceIdentifier } from './types';

export const DEFAULT_UTILIZATION = 0.5;
export const LB_CAPACITY_UNIT_WARN_THRESHOLD = 1000;
export const MAX_CUSTOM_METRICS = 1_000_000;
export const MAX_CACHE_NODES = 1000;

export interface CarbonEstimate {
  gramsCO2e: number;
  ok: boolean;
}

/**
 * Optional collaborator estimating the carbon footprint of running an instance
 */
export interface CarbonEstimator {
  estimate(sku: string, region: string, utilization: number, hours: number): CarbonEstimate;
}

export interface CalculationContext {
  identity: ResourceIdentity;
  attributes: AttributeReader;
  utilization: number;
  traceId: string;
}

export type ServiceCalculator = (resource: ResourceDescriptor, context: CalculationContext) => CostEstimate;

const ZERO_COST_DESCRIPTIONS: Record<string, string> = {
  vpc: 'VPC has no direct hourly or monthly charge. Costs may apply for associated resources (NAT Gateway, VPN, etc.)',
  securitygroup: 'Security Groups have no direct charge. They are a free networking feature.',
  subnet: 'Subnets have no direct charge. Costs may apply for data transfer between AZs.',
  iam: 'IAM resources (users, roles, policies) have no direct charge. They are a free AWS feature.',
};

/**
 * Pick the utilization used for carbon estimates: per-resource value, then
 * request value, then the default, clamped to [0, 1]
 */
export function resolveUtilization(requestValue?: number, resourceValue?: number): number {
  if (resourceValue !== undefined && resourceValue > 0) return clamp(resourceValue, 0, 1);
  if (requestValue !== undefined && requestValue > 0) return clamp(requestValue, 0, 1);
  return DEFAULT_UTILIZATION;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export function notFoundDetail(what: string, sku: string): string {
  return `${what} "${sku}" not found in pricing data`;
}

export function unavailableDetail(what: string, region: string): string {
  return `${what} pricing data not available for region ${region}`;
}

export function zeroEstimate(billingDetail: string): CostEstimate {
  return {
    monthlyCost: 0,
    unitPrice: 0,
    currency: 'USD',
    billingDetail,
    components: [],
  };
}

function estimate(monthlyCost: number, unitPrice: number, billingDetail: string, components: CostComponent[]): CostEstimate {
  return { monthlyCost, unitPrice, currency: 'USD', billingDetail, components };
}

function withNotes(base: string, notes: string[]): string {
  return notes.length > 0 ? `${base} (${notes.join(', ')})` : base;
}

export class CostCalculator {
  private readonly pricing: PricingSource;
  private readonly logger: Logger;
  private readonly carbon?: CarbonEstimator;
  private readonly calculators: Record<ServiceIdentifier, ServiceCalculator>;

  constructor(pricing: PricingSource, logger: Logger, carbon?: CarbonEstimator) {
    this.pricing = pricing;
    this.logger = logger;
    this.carbon = carbon;
    this.calculators = this.initializeCalculators();
  }

  get region(): string {
    return this.pricing.region;
  }

  /**
   * Estimate the monthly cost of a resource already resolved to a service
   */
  calculate(resource: ResourceDescriptor, context: CalculationContext): CostEstimate {
    const calculator = this.calculators[context.identity.service];
    return calculator(resource, context);
  }

  /**
   * Initialize calculators for every service identifier
   */
  private initializeCalculators(): Record<ServiceIdentifier, ServiceCalculator> {
    return {
      'compute-instance': (resource, context) => this.calculateEC2Cost(resource, context),
      'block-volume': (resource, context) => this.calculateEBSCost(resource, context),
      'relational-db': (resource, context) => this.calculateRDSCost(resource, context),
      'managed-k8s': (resource, context) => this.calculateEKSCost(resource, context),
      'object-storage': (resource, context) => this.calculateS3Cost(resource, context),
      function: (resource, context) => this.calculateLambdaCost(resource, context),
      'kv-table': (resource, context) => this.calculateDynamoDBCost(resource, context),
      'load-balancer': (resource, context) => this.calculateLoadBalancerCost(resource, context),
      'nat-gateway': (resource, context) => this.calculateNATGatewayCost(resource, context),
      'log-metric-service': (resource, context) => this.calculateCloudWatchCost(resource, context),
      'cache-cluster': (resource, context) => this.calculateElastiCacheCost(resource, context),
      'no-charge': (_resource, context) =>
        zeroEstimate(
          ZERO_COST_DESCRIPTIONS[context.identity.serviceCode] ??
            `${context.identity.serviceCode} has no direct AWS charge`,
        ),
      unknown: resource => zeroEstimate(`Resource type "${resource.resourceType}" not supported for cost estimation`),
    };
  }

  private calculateEC2Cost(resource: ResourceDescriptor, context: CalculationContext): CostEstimate {
    const instanceType = resource.sku;
    const { os, tenancy } = extractComputeAttributes(context.attributes);

    const price = this.pricing.ec2OnDemandPrice(instanceType, os, tenancy);
    if (!price.found) {
      this.logger.debug({ instanceType, os, tenancy, region: this.region }, 'EC2 instance type not found in pricing data');
      return zeroEstimate(notFoundDetail('EC2 instance type', instanceType));
    }

    const monthlyCost = price.rate * HOURS_PER_MONTH;
    const result = estimate(monthlyCost, price.rate, `On-demand ${os}, ${tenancy} tenancy, 730 hrs/month`, [{
      component: `EC2 ${instanceType} (${os})`,
      quantity: HOURS_PER_MONTH,
      unitPrice: price.rate,
      monthlyCost,
      unit: 'hours',
    }]);

    const carbon = this.estimateCarbon(instanceType, context.utilization);
    return carbon ? { ...result, impactMetrics: [carbon] } : result;
  }

  private calculateEBSCost(resource: ResourceDescriptor, context: CalculationContext): CostEstimate {
    const volumeType = resource.sku;
    const { sizeGb, sizeDefaulted } = extractVolumeAttributes(context.attributes, this.logger);

    const price = this.pricing.ebsPricePerGBMonth(volumeType);
    if (!price.found) {
      this.logger.debug({ volumeType, region: this.region }, 'EBS volume type not found in pricing data');
      return zeroEstimate(notFoundDetail('EBS volume type', volumeType));
    }

    const monthlyCost = price.rate * sizeGb;
    const sizeLabel = `${sizeGb} GB${sizeDefaulted ? ' (defaulted)' : ''}`;
    return estimate(monthlyCost, price.rate, `${volumeType} volume, ${sizeLabel}, $${price.rate.toFixed(4)}/GB-month`, [{
      component: `EBS ${volumeType} storage`,
      quantity: sizeGb,
      unitPrice: price.rate,
      monthlyCost,
      unit: 'GB-month',
    }]);
  }

  private calculateS3Cost(resource: ResourceDescriptor, context: CalculationContext): CostEstimate {
    const storageClass = resource.sku || 'STANDARD';
    const { sizeGb, sizeDefaulted } = extractObjectStorageAttributes(context.attributes, this.logger);

    const price = this.pricing.s3PricePerGBMonth(storageClass);
    if (!price.found) {
      this.logger.debug({ storageClass, region: this.region }, 'S3 storage class not found in pricing data');
      return zeroEstimate(notFoundDetail('S3 storage class', storageClass));
    }

    const monthlyCost = price.rate * sizeGb;
    const sizeLabel = `${sizeGb.toFixed(0)} GB${sizeDefaulted ? ' (defaulted)' : ''}`;
    return estimate(monthlyCost, price.rate, `S3 ${storageClass} storage, ${sizeLabel}, $${price.rate.toFixed(4)}/GB-month`, [{
      component: `S3 ${storageClass} storage`,
      quantity: sizeGb,
      unitPrice: price.rate,
      monthlyCost,
      unit: 'GB-month',
    }]);
  }

  private calculateRDSCost(resource: ResourceDescriptor, context: CalculationContext): CostEstimate {
    const instanceType = resource.sku;
    const db = extractDatabaseAttributes(context.attributes, this.logger);

    const price = this.pricing.rdsOnDemandPrice(instanceType, db.engine);
    if (!price.found) {
      this.logger.debug({ instanceType, engine: db.engine, region: this.region }, 'RDS instance type not found in pricing data');
      return zeroEstimate(notFoundDetail('RDS instance type', instanceType));
    }

    // A missing storage rate leaves storage uncharged
    const storage = this.pricing.rdsStoragePricePerGBMonth(db.storageType);
    const storageRate = storage.found ? storage.rate : 0;

    const instanceCost = price.rate * HOURS_PER_MONTH;
    const storageCost = storageRate * db.storageSizeGb;

    const notes: string[] = [];
    if (db.engineDefaulted) notes.push('engine defaulted to MySQL');
    if (db.storageTypeDefaulted) notes.push('storage type defaulted');
    if (db.storageSizeDefaulted) notes.push('size defaulted to 20GB');

    const detail = withNotes(
      `RDS ${instanceType} ${db.engine}, 730 hrs/month + ${db.storageSizeGb}GB ${db.storageType} storage`,
      notes,
    );

    return estimate(instanceCost + storageCost, price.rate, detail, [
      {
        component: `RDS ${instanceType} (${db.engine})`,
        quantity: HOURS_PER_MONTH,
        unitPrice: price.rate,
        monthlyCost: instanceCost,
        unit: 'hours',
      },
      {
        component: `Storage (${db.storageType})`,
        quantity: db.storageSizeGb,
        unitPrice: storageRate,
        monthlyCost: storageCost,
        unit: 'GB-month',
      },
    ]);
  }

  private calculateEKSCost(resource: ResourceDescriptor, context: CalculationContext): CostEstimate {
    const extended =
      resource.sku === 'cluster-extended' ||
      context.attributes.getString('support_type')?.toLowerCase() === 'extended';

    const price = this.pricing.eksClusterPricePerHour(extended);
    if (!price.found) {
      return zeroEstimate(unavailableDetail('EKS', this.region));
    }

    const supportType = extended ? 'extended support' : 'standard support';
    const monthlyCost = price.rate * HOURS_PER_MONTH;
    return estimate(
      monthlyCost,
      price.rate,
      `EKS cluster (${supportType}), 730 hrs/month (control plane only, excludes worker nodes)`,
      [{ component: `EKS control plane (${supportType})`, quantity: HOURS_PER_MONTH, unitPrice: price.rate, monthlyCost, unit: 'hours' }],
    );
  }

  private calculateLambdaCost(resource: ResourceDescriptor, context: CalculationContext): CostEstimate {
    const fn = extractFunctionAttributes(resource.sku, context.attributes, this.logger);

    const requestPrice = this.pricing.lambdaPricePerRequest();
    const gbSecondPrice = this.pricing.lambdaPricePerGBSecond(fn.architecture);
    if (!requestPrice.found || !gbSecondPrice.found) {
      this.logger.warn(
        { requestPriceFound: requestPrice.found, gbSecondPriceFound: gbSecondPrice.found, architecture: fn.architecture },
        'Lambda pricing unavailable',
      );
      return zeroEstimate(unavailableDetail('Lambda', this.region));
    }

    const gbSeconds = (fn.memoryMb / 1024) * (fn.avgDurationMs / 1000) * fn.requestsPerMonth;
    const requestCost = fn.requestsPerMonth * requestPrice.rate;
    const computeCost = gbSeconds * gbSecondPrice.rate;

    const notes: string[] = [];
    if (fn.memoryDefaulted) notes.push('memory defaulted');
    if (fn.requestsDefaulted) notes.push('requests defaulted');
    if (fn.durationDefaulted) notes.push('duration defaulted');
    if (fn.architectureDefaulted) notes.push('arch defaulted to x86_64');

    const base = `Lambda ${fn.memoryMb}MB (${fn.architecture}), ${fn.requestsPerMonth} requests/month, ${fn.avgDurationMs}ms avg duration`;
    const detail = `${withNotes(base, notes)}, ${gbSeconds.toFixed(0)} GB-seconds`;

    return estimate(requestCost + computeCost, gbSecondPrice.rate, detail, [
      { component: 'Lambda requests', quantity: fn.requestsPerMonth, unitPrice: requestPrice.rate, monthlyCost: requestCost, unit: 'requests' },
      { component: `Lambda compute (${fn.architecture})`, quantity: gbSeconds, unitPrice: gbSecondPrice.rate, monthlyCost: computeCost, unit: 'GB-seconds' },
    ]);
  }

  private calculateDynamoDBCost(resource: ResourceDescriptor, context: CalculationContext): CostEstimate {
    const table = extractTableAttributes(resource.sku, context.attributes, this.logger);
    const unavailable: string[] = [];
    const components: CostComponent[] = [];

    const storagePrice = this.pricing.dynamoDBStoragePricePerGBMonth();
    let storageCost = 0;
    if (storagePrice.found) {
      storageCost = table.storageGb * storagePrice.rate;
      components.push({ component: 'Table storage', quantity: table.storageGb, unitPrice: storagePrice.rate, monthlyCost: storageCost, unit: 'GB-month' });
    } else {
      this.logger.warn({ capacityMode: table.mode }, 'DynamoDB storage pricing unavailable');
      unavailable.push('Storage');
    }

    let total = storageCost;
    let unitPrice: number;
    let detail: string;

    if (table.mode === 'provisioned') {
      const rcu = this.pricing.dynamoDBProvisionedRCUPrice();
      const wcu = this.pricing.dynamoDBProvisionedWCUPrice();

      if (rcu.found) {
        const cost = table.readCapacityUnits * HOURS_PER_MONTH * rcu.rate;
        total += cost;
        components.push({ component: 'Read capacity', quantity: table.readCapacityUnits * HOURS_PER_MONTH, unitPrice: rcu.rate, monthlyCost: cost, unit: 'RCU-hours' });
      } else {
        this.logger.warn('DynamoDB provisioned RCU pricing unavailable');
        unavailable.push('RCU');
      }
      if (wcu.found) {
        const cost = table.writeCapacityUnits * HOURS_PER_MONTH * wcu.rate;
        total += cost;
        components.push({ component: 'Write capacity', quantity: table.writeCapacityUnits * HOURS_PER_MONTH, unitPrice: wcu.rate, monthlyCost: cost, unit: 'WCU-hours' });
      } else {
        this.logger.warn('DynamoDB provisioned WCU pricing unavailable');
        unavailable.push('WCU');
      }

      unitPrice = rcu.rate;
      detail = `DynamoDB provisioned, ${table.readCapacityUnits} RCUs, ${table.writeCapacityUnits} WCUs, 730 hrs/month, ${table.storageGb.toFixed(0)}GB storage`;
    } else {
      const read = this.pricing.dynamoDBOnDemandReadPrice();
      const write = this.pricing.dynamoDBOnDemandWritePrice();

      if (read.found) {
        const cost = table.readRequestsPerMonth * read.rate;
        total += cost;
        components.push({ component: 'Read requests', quantity: table.readRequestsPerMonth, unitPrice: read.rate, monthlyCost: cost, unit: 'requests' });
      } else {
        this.logger.warn('DynamoDB on-demand read pricing unavailable');
        unavailable.push('Read');
      }
      if (write.found) {
        const cost = table.writeRequestsPerMonth * write.rate;
        total += cost;
        components.push({ component: 'Write requests', quantity: table.writeRequestsPerMonth, unitPrice: write.rate, monthlyCost: cost, unit: 'requests' });
      } else {
        this.logger.warn('DynamoDB on-demand write pricing unavailable');
        unavailable.push('Write');
      }

      unitPrice = storagePrice.rate;
      detail = `DynamoDB on-demand, ${table.readRequestsPerMonth} reads, ${table.writeRequestsPerMonth} writes, ${table.storageGb.toFixed(0)}GB storage`;
    }

    if (unavailable.length > 0) {
      detail += ` (pricing unavailable: ${unavailable.join(', ')})`;
    }
    if (total === 0) {
      detail += ' (missing or zero usage inputs)';
    }

    return estimate(total, unitPrice, detail, components);
  }

  private calculateLoadBalancerCost(resource: ResourceDescriptor, context: CalculationContext): CostEstimate {
    const lb = extractLoadBalancerAttributes(resource.sku, context.attributes, this.logger);
    const label = lb.kind.toUpperCase();
    const unitLabel = lb.kind === 'nlb' ? 'NLCU' : 'LCU';

    if (lb.capacityUnits > LB_CAPACITY_UNIT_WARN_THRESHOLD) {
      this.logger.warn({ kind: lb.kind, capacityUnits: lb.capacityUnits }, 'unusually high capacity unit value');
    }

    const fixed = this.pricing.loadBalancerPricePerHour(lb.kind);
    const perUnit = this.pricing.loadBalancerPricePerCapacityUnit(lb.kind);
    if (!fixed.found || !perUnit.found) {
      return zeroEstimate(unavailableDetail(label, this.region));
    }

    const fixedCost = HOURS_PER_MONTH * fixed.rate;
    const capacityCost = HOURS_PER_MONTH * lb.capacityUnits * perUnit.rate;

    return estimate(fixedCost + capacityCost, fixed.rate, `${label}, 730 hrs/month, ${lb.capacityUnits.toFixed(1)} ${unitLabel} avg/hr`, [
      { component: `${label} hours`, quantity: HOURS_PER_MONTH, unitPrice: fixed.rate, monthlyCost: fixedCost, unit: 'hours' },
      { component: `${unitLabel} usage`, quantity: HOURS_PER_MONTH * lb.capacityUnits, unitPrice: perUnit.rate, monthlyCost: capacityCost, unit: `${unitLabel}-hours` },
    ]);
  }

  private calculateNATGatewayCost(_resource: ResourceDescriptor, context: CalculationContext): CostEstimate {
    const hourly = this.pricing.natGatewayPricePerHour();
    const dataTiers = this.pricing.natGatewayDataTiers();
    if (!hourly.found || dataTiers.length === 0) {
      return zeroEstimate(unavailableDetail('NAT Gateway', this.region));
    }

    const dataProcessedGb = this.parseStrictUsage(context, 'data_processed_gb', true);

    const hourlyCost = hourly.rate * HOURS_PER_MONTH;
    const dataRate = firstTierRate(dataTiers);
    const components: CostComponent[] = [
      { component: 'NAT Gateway hours', quantity: HOURS_PER_MONTH, unitPrice: hourly.rate, monthlyCost: hourlyCost, unit: 'hours' },
    ];

    let detail = `NAT Gateway, 730 hrs/month ($${hourly.rate.toFixed(3)}/hr)`;
    let dataCost = 0;
    if (dataProcessedGb === undefined) {
      detail += " (data processing cost not included; use 'data_processed_gb' tag to estimate)";
    } else if (dataProcessedGb > 0) {
      dataCost = calculateTieredCost(dataProcessedGb, dataTiers);
      detail += ` + ${dataProcessedGb.toFixed(2)} GB data processed ($${dataRate.toFixed(3)}/GB)`;
      components.push({ component: 'Data processed', quantity: dataProcessedGb, unitPrice: dataRate, monthlyCost: dataCost, unit: 'GB' });
    } else {
      detail += ' (0 GB data processed)';
    }

    return estimate(hourlyCost + dataCost, hourly.rate, detail, components);
  }

  private calculateCloudWatchCost(resource: ResourceDescriptor, context: CalculationContext): CostEstimate {
    const sku = resource.sku.toLowerCase() || 'logs';

    const ingestionGb = this.parseStrictUsage(context, 'log_ingestion_gb', false) ?? 0;
    const storageGb = this.parseStrictUsage(context, 'log_storage_gb', false) ?? 0;
    const customMetrics = this.parseStrictUsage(context, 'custom_metrics', false, MAX_CUSTOM_METRICS) ?? 0;

    const parts: string[] = [];
    const components: CostComponent[] = [];
    let total = 0;

    if (sku === 'logs' || sku === 'combined') {
      if (ingestionGb > 0) {
        const tiers = this.pricing.cloudWatchLogsIngestionTiers();
        if (tiers.length > 0) {
          const cost = calculateTieredCost(ingestionGb, tiers);
          total += cost;
          parts.push(`${ingestionGb.toFixed(2)} GB logs ingested ($${cost.toFixed(2)})`);
          components.push({ component: 'Logs ingestion', quantity: ingestionGb, unitPrice: firstTierRate(tiers), monthlyCost: cost, unit: 'GB' });
        } else {
          parts.push(unavailableDetail('CloudWatch Logs ingestion', this.region));
        }
      }

      if (storageGb > 0) {
        const rate = this.pricing.cloudWatchLogsStoragePricePerGBMonth();
        if (rate.found) {
          const cost = storageGb * rate.rate;
          total += cost;
          parts.push(`${storageGb.toFixed(2)} GB logs stored @ $${rate.rate.toFixed(4)}/GB-mo ($${cost.toFixed(2)})`);
          components.push({ component: 'Logs storage', quantity: storageGb, unitPrice: rate.rate, monthlyCost: cost, unit: 'GB-month' });
        } else {
          parts.push(unavailableDetail('CloudWatch Logs storage', this.region));
        }
      }
    }

    if (sku === 'metrics' || sku === 'combined') {
      if (customMetrics > 0) {
        const tiers = this.pricing.cloudWatchMetricTiers();
        if (tiers.length > 0) {
          const cost = calculateTieredCost(customMetrics, tiers);
          total += cost;
          parts.push(`${customMetrics.toFixed(0)} custom metrics ($${cost.toFixed(2)})`);
          components.push({ component: 'Custom metrics', quantity: customMetrics, unitPrice: firstTierRate(tiers), monthlyCost: cost, unit: 'metrics' });
        } else {
          parts.push(unavailableDetail('CloudWatch Metrics', this.region));
        }
      }
    }

    this.logger.debug({ sku, ingestionGb, storageGb, customMetrics, total }, 'CloudWatch cost estimated');

    const detail = parts.length > 0
      ? `CloudWatch: ${parts.join(', ')}`
      : 'CloudWatch: No usage specified (use tags: log_ingestion_gb, log_storage_gb, custom_metrics)';

    return estimate(total, 0, detail, components);
  }

  private calculateElastiCacheCost(resource: ResourceDescriptor, context: CalculationContext): CostEstimate {
    const nodeType = resource.sku;
    if (!nodeType) {
      throw new InvalidRequestError(
        "ElastiCache node type not specified: use 'sku' field or 'instanceType' tag",
        context.traceId,
      );
    }

    const { engine } = extractCacheAttributes(context.attributes);
    const nodes = this.parseNodeCount(context);

    const price = this.pricing.elastiCacheOnDemandPrice(nodeType, engine);
    if (!price.found) {
      this.logger.debug({ nodeType, engine, region: this.region }, 'ElastiCache node type not found in pricing data');
      return zeroEstimate(notFoundDetail(`ElastiCache ${engine} node`, nodeType));
    }

    const monthlyCost = price.rate * HOURS_PER_MONTH * nodes;
    const nodeLabel = nodes === 1 ? '1 node' : `${nodes} nodes`;
    const result = estimate(monthlyCost, price.rate, `ElastiCache ${nodeType} (${engine}), ${nodeLabel}, 730 hrs/month`, [{
      component: `ElastiCache ${nodeType} (${engine})`,
      quantity: HOURS_PER_MONTH * nodes,
      unitPrice: price.rate,
      monthlyCost,
      unit: 'node-hours',
    }]);

    const carbon = this.estimateCarbon(nodeType, context.utilization, nodes);
    return carbon ? { ...result, impactMetrics: [carbon] } : result;
  }

  /**
   * Strictly parse a user-supplied usage tag. Absent tags yield undefined;
   * malformed, negative or out-of-range values are rejected.
   */
  private parseStrictUsage(
    context: CalculationContext,
    key: string,
    emptyIsError: boolean,
    max?: number,
  ): number | undefined {
    const text = context.attributes.getText(key);
    if (text === undefined) return undefined;

    if (text.trim() === '') {
      if (emptyIsError) {
        throw new InvalidRequestError(`tag '${key}' is present but empty`, context.traceId);
      }
      return undefined;
    }

    const trimmed = text.trim();
    if (!NUMERIC_PATTERN.test(trimmed)) {
      throw new InvalidRequestError(`invalid value for '${key}': "${text}" is not a valid number`, context.traceId);
    }

    const value = parseFloat(trimmed);
    if (max !== undefined && (value < 0 || value > max)) {
      throw new InvalidRequestError(`invalid value for '${key}': ${value} must be between 0 and ${max}`, context.traceId);
    }
    if (value < 0) {
      throw new InvalidRequestError(`invalid value for '${key}': ${value.toFixed(2)} cannot be negative`, context.traceId);
    }
    return value;
  }

  private parseNodeCount(context: CalculationContext): number {
    const text = context.attributes.getString('num_nodes') ?? context.attributes.getString('num_cache_nodes');
    if (text === undefined) return 1;

    if (!/^[+-]?\d+$/.test(text)) {
      throw new InvalidRequestError(`invalid value for node count: "${text}" is not a valid integer`, context.traceId);
    }
    const nodes = parseInt(text, 10);
    if (nodes < 1 || nodes > MAX_CACHE_NODES) {
      throw new InvalidRequestError(
        `invalid value for node count: ${nodes} must be between 1 and ${MAX_CACHE_NODES}`,
        context.traceId,
      );
    }
    return nodes;
  }

  private estimateCarbon(sku: string, utilization: number, multiplier: number = 1): ImpactMetric | undefined {
    if (!this.carbon) return undefined;

    const result = this.carbon.estimate(sku, this.region, utilization, HOURS_PER_MONTH);
    if (!result.ok) {
      this.logger.debug({ sku }, 'no carbon estimate for instance type');
      return undefined;
    }
    return { kind: 'carbon_footprint', value: result.gramsCO2e * multiplier, unit: 'gCO2e' };
  }
}
