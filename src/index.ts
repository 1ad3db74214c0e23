/**
 * AWS Cost Engine
 * Single-region AWS cost estimation: projected and actual costs, pricing specs and recommendations
 */

// Export types
export * from './types';

// Export main classes
export { CostEngine, parseVendorResourceType, type CostEngineOptions, type VendorResourceType } from './cost-engine';
export { CostCalculator, type CarbonEstimator, type CarbonEstimate } from './cost-calculator';
export { PricingSpecBuilder } from './pricing-spec';
export { RecommendationGenerator, loadUpgradePaths, type UpgradePaths } from './recommendations';
export { InputLoader } from './input-loader';
export { OutputFormatter, formatCurrency, type OutputFormat } from './output-formatter';

// Export configuration, logging and errors
export { resolveConfig, loadEnvFile, type EngineConfig, type ResolvedConfig } from './config';
export { createLogger, silentLogger, type Logger } from './logger';
export { CostEngineError, InvalidRequestError, RegionMismatchError } from './errors';

// Export pricing utilities
export {
  EmbeddedPricingSource,
  HOURS_PER_MONTH,
  BASE_REGION,
  getRegionalMultiplier,
  loadPriceList,
  type PricingSource,
  type PriceList,
} from './pricing-data';
export { calculateTieredCost } from './tiered-cost';
export { parseArn, type ArnComponents } from './arn';
export { resolveResourceType, normalizeResourceType } from './resource-resolver';
