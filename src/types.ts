/**
 * Type definitions for AWS cost estimation
 */

export type Currency = 'USD';

export type ServiceIdentifier =
  | 'compute-instance'
  | 'block-volume'
  | 'relational-db'
  | 'managed-k8s'
  | 'object-storage'
  | 'function'
  | 'kv-table'
  | 'load-balancer'
  | 'nat-gateway'
  | 'log-metric-service'
  | 'cache-cluster'
  | 'no-charge'
  | 'unknown';

export interface ResourceDescriptor {
  provider: string;
  resourceType: string;
  sku: string;
  region: string;
  tags: Readonly<Record<string, string>>;
  id?: string;
  name?: string;
  utilizationPercentage?: number;
}

export interface ResourceIdentity {
  normalizedType: string;
  serviceCode: string;
  service: ServiceIdentifier;
}

export interface CostComponent {
  component: string;
  quantity: number;
  unitPrice: number;
  monthlyCost: number;
  unit: string;
}

export type ImpactMetricKind = 'carbon_footprint';

export interface ImpactMetric {
  kind: ImpactMetricKind;
  value: number;
  unit: string;
}

export type GrowthType = 'none' | 'linear';

export interface CostEstimate {
  monthlyCost: number;
  unitPrice: number;
  currency: Currency;
  billingDetail: string;
  components: CostComponent[];
  impactMetrics?: ImpactMetric[];
  growthType?: GrowthType;
}

export interface PricingTier {
  /** Upper bound of the tier in the service's usage unit; Infinity for the last tier */
  upTo: number;
  rate: number;
}

export interface RateLookup {
  rate: number;
  found: boolean;
}

// Requests

export interface ProjectedCostRequest {
  resource?: ResourceDescriptor;
  utilizationPercentage?: number;
}

export interface ActualCostRequest {
  resourceId?: string;
  arn?: string;
  tags?: Record<string, string>;
  start?: Date;
  end?: Date;
}

export interface PricingSpecRequest {
  resource?: ResourceDescriptor;
}

export interface SupportsRequest {
  resource?: ResourceDescriptor;
}

export interface RecommendationFilter {
  region?: string;
  resourceType?: string;
  sku?: string;
  tags?: Record<string, string>;
}

export interface RecommendationsRequest {
  targetResources?: ResourceDescriptor[];
  filter?: RecommendationFilter;
}

export type AttributeValue = string | number | boolean | null;

export interface EstimateCostRequest {
  resourceType: string;
  attributes?: Record<string, AttributeValue>;
}

// Responses

export type TimestampSource = 'explicit' | 'pulumi:created' | 'mixed';

export type ConfidenceLevel = 'HIGH' | 'MEDIUM' | 'LOW';

export interface TimestampResolution {
  start: Date;
  end: Date;
  source: TimestampSource;
  isImported: boolean;
}

export interface FocusCostRecord {
  chargePeriodStart: string;
  chargePeriodEnd: string;
  chargeCategory: 'usage';
  chargeClass: 'regular';
  chargeFrequency: 'usage-based';
  chargeDescription: string;
  pricingCategory: 'standard';
  pricingUnit: string;
  pricingQuantity: number;
  listUnitPrice: number;
  billedCost: number;
  effectiveCost: number;
  listCost: number;
  billingCurrency: Currency;
  serviceName: string;
  serviceCategory: string;
  serviceProviderName: 'AWS';
  regionId: string;
  resourceId: string;
  resourceType: string;
  skuId: string;
}

export interface ActualCostResult {
  timestamp: Date;
  cost: number;
  usageAmount: number;
  usageUnit: string;
  source: string;
  focusRecord: FocusCostRecord;
}

export type BillingMode =
  | 'per_hour'
  | 'per_gb_month'
  | 'per_request_and_gb_second'
  | 'provisioned_capacity'
  | 'on_demand'
  | 'per_hour_plus_lcu'
  | 'per_hour_plus_nlcu'
  | 'per_hour_plus_data'
  | 'tiered_per_metric'
  | 'tiered_ingestion_plus_storage'
  | 'unknown';

export interface PricingSpec {
  provider: string;
  resourceType: string;
  sku: string;
  region: string;
  billingMode: BillingMode;
  ratePerUnit: number;
  currency: Currency;
  /** Unit the rate is quoted in, absent when no rate was found */
  unit?: string;
  description: string;
  assumptions: string[];
  source: string;
}

export interface SupportsResult {
  supported: boolean;
  reason: string;
  supportedMetrics: ImpactMetricKind[];
}

export type RecommendationPriority = 'HIGH' | 'MEDIUM' | 'LOW';

export type ModificationType = 'generation_upgrade' | 'graviton_migration' | 'volume_type_upgrade';

export interface RecommendationImpact {
  estimatedSavings: number;
  savingsPercentage: number;
  currency: Currency;
  projectionPeriod: 'monthly';
  currentCost: number;
  projectedCost: number;
}

export interface Recommendation {
  id: string;
  category: 'cost';
  actionType: 'modify';
  resource: {
    provider: 'aws';
    resourceType: string;
    region: string;
    sku: string;
    id?: string;
    name?: string;
  };
  modificationType: ModificationType;
  currentConfig: Record<string, string>;
  recommendedConfig: Record<string, string>;
  impact?: RecommendationImpact;
  priority: RecommendationPriority;
  confidenceScore: number;
  description: string;
  reasoning: string[];
  metadata: Record<string, string>;
  source: string;
}

export interface RecommendationSummary {
  totalRecommendations: number;
  totalEstimatedSavings: number;
  currency: Currency;
  projectionPeriod: 'monthly';
  countByCategory: Record<string, number>;
  countByActionType: Record<string, number>;
}

export interface RecommendationsResponse {
  recommendations: Recommendation[];
  summary: RecommendationSummary;
}
