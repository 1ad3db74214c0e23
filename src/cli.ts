#!/usr/bin/env node

/**
 * AWS Cost Engine CLI
 * Projected, actual and pricing-spec queries over resource files, plus SKU recommendations
 */

import { Command, program } from 'commander';
import * as fs from 'fs';
import chalk from 'chalk';
import { loadEnvFile, resolveConfig } from './config';
import { CostEngine } from './cost-engine';
import { errorMessage } from './errors';
import { InputLoader } from './input-loader';
import { createLogger } from './logger';
import {
  OUTPUT_FORMATS,
  OutputFormatter,
  isOutputFormat,
  type ActualCostEntry,
  type EstimateEntry,
  type OutputFormat,
  type ProjectedCostEntry,
  type SupportsEntry,
} from './output-formatter';
import type { ActualCostRequest } from './types';

interface CommonOptions {
  region?: string;
  format: string;
  output?: string;
  envFile?: string;
  strict?: boolean;
  verbose?: boolean;
}

interface ProjectedOptions extends CommonOptions {
  utilization?: string;
}

program
  .name('aws-cost-engine')
  .description('Single-region AWS cost engine: projected and actual costs, pricing specs and recommendations')
  .version('1.0.0');

withCommonOptions(
  program
    .command('projected')
    .description('Projected monthly cost of each resource')
    .argument('<files...>', 'Resource files or glob patterns (JSON or YAML)')
    .option('-u, --utilization <ratio>', 'Utilization between 0 and 1 used for carbon estimates'),
).action(async (files: string[], options: ProjectedOptions) => {
  await run(() => runProjected(files, options));
});

withCommonOptions(
  program
    .command('actual')
    .description('Cost accrued by each resource over a time window')
    .argument('<files...>', 'Actual cost request files or glob patterns'),
).action(async (files: string[], options: CommonOptions) => {
  await run(() => runActual(files, options));
});

withCommonOptions(
  program
    .command('pricing-spec')
    .description('Describe how each resource is billed')
    .argument('<files...>', 'Resource files or glob patterns'),
).action(async (files: string[], options: CommonOptions) => {
  await run(() => runPricingSpec(files, options));
});

withCommonOptions(
  program
    .command('recommend')
    .description('Suggest cheaper instance and volume types')
    .argument('<files...>', 'Recommendation request files or glob patterns'),
).action(async (files: string[], options: CommonOptions) => {
  await run(() => runRecommend(files, options));
});

withCommonOptions(
  program
    .command('supports')
    .description('Check whether each resource can be priced by this engine')
    .argument('<files...>', 'Resource files or glob patterns'),
).action(async (files: string[], options: CommonOptions) => {
  await run(() => runSupports(files, options));
});

withCommonOptions(
  program
    .command('estimate')
    .description('Estimate monthly cost from vendor resource types and attributes')
    .argument('<files...>', 'Estimate request files or glob patterns'),
).action(async (files: string[], options: CommonOptions) => {
  await run(() => runEstimate(files, options));
});

function withCommonOptions(command: Command): Command {
  return command
    .option('-r, --region <region>', 'Engine region (default: COST_ENGINE_REGION or us-east-1)')
    .option('-f, --format <format>', `Output format: ${OUTPUT_FORMATS.join(', ')}`, 'table')
    .option('-o, --output <file>', 'Write output to file')
    .option('--env-file <file>', 'Load environment variables from this file')
    .option('--strict', 'Fail recommendation requests that name unsupported resources')
    .option('-v, --verbose', 'Verbose output');
}

async function run(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    console.error(chalk.red('Error:'), errorMessage(error));
    process.exit(1);
  }
}

/**
 * Resolve configuration from the environment and flags, then build the engine
 */
function createEngine(options: CommonOptions): CostEngine {
  loadEnvFile(options.envFile);
  const { config, warnings } = resolveConfig(process.env, {
    region: options.region,
    strictValidation: options.strict ? true : undefined,
    logLevel: options.verbose ? 'debug' : undefined,
  });

  const logger = createLogger({ level: config.logLevel });
  for (const warning of warnings) {
    logger.warn(warning);
  }

  if (options.verbose) {
    console.error(chalk.gray(`Region: ${config.region}`));
    console.error(chalk.gray(`Max batch size: ${config.maxBatchSize}`));
  }

  return new CostEngine({ config, logger });
}

function outputFormat(format: string): OutputFormat {
  if (!isOutputFormat(format)) {
    throw new Error(`Unsupported output format "${format}"; use ${OUTPUT_FORMATS.join(', ')}`);
  }
  return format;
}

function parseUtilization(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (isNaN(parsed) || parsed < 0 || parsed > 1) {
    throw new Error(`Invalid utilization "${value}"; expected a number between 0 and 1`);
  }
  return parsed;
}

function emit(result: string, output: string | undefined): void {
  if (output) {
    fs.writeFileSync(output, result);
    console.log(chalk.green(`Output written to ${output}`));
  } else {
    console.log(result);
  }
}

async function runProjected(files: string[], options: ProjectedOptions): Promise<void> {
  const format = outputFormat(options.format);
  const utilizationPercentage = parseUtilization(options.utilization);
  const engine = createEngine(options);
  const resources = await InputLoader.loadResources(files);

  const entries: ProjectedCostEntry[] = [];
  for (const resource of resources) {
    try {
      entries.push({ resource, estimate: engine.getProjectedCost({ resource, utilizationPercentage }) });
    } catch (error) {
      console.warn(chalk.yellow(`Warning: Failed to price ${resource.resourceType} ${resource.sku}: ${errorMessage(error)}`));
    }
  }

  if (entries.length === 0) {
    throw new Error('No results to display');
  }
  emit(new OutputFormatter().formatProjected(entries, format), options.output);
}

async function runActual(files: string[], options: CommonOptions): Promise<void> {
  const format = outputFormat(options.format);
  const engine = createEngine(options);
  const requests = await InputLoader.loadActualCostRequests(files);

  const entries: ActualCostEntry[] = [];
  for (const [index, request] of requests.entries()) {
    const label = actualCostLabel(request, index);
    try {
      entries.push({ label, results: engine.getActualCost(request) });
    } catch (error) {
      console.warn(chalk.yellow(`Warning: Failed to price ${label}: ${errorMessage(error)}`));
    }
  }

  if (entries.length === 0) {
    throw new Error('No results to display');
  }
  emit(new OutputFormatter().formatActual(entries, format), options.output);
}

async function runPricingSpec(files: string[], options: CommonOptions): Promise<void> {
  const format = outputFormat(options.format);
  const engine = createEngine(options);
  const resources = await InputLoader.loadResources(files);

  const specs = resources.map(resource => engine.getPricingSpec({ resource }));
  emit(new OutputFormatter().formatPricingSpecs(specs, format), options.output);
}

async function runRecommend(files: string[], options: CommonOptions): Promise<void> {
  const format = outputFormat(options.format);
  const engine = createEngine(options);
  const request = await InputLoader.loadRecommendationsRequest(files);

  const response = engine.getRecommendations(request);
  emit(new OutputFormatter().formatRecommendations(response, format), options.output);
}

async function runSupports(files: string[], options: CommonOptions): Promise<void> {
  const format = outputFormat(options.format);
  const engine = createEngine(options);
  const resources = await InputLoader.loadResources(files);

  const entries: SupportsEntry[] = resources.map(resource => ({ resource, result: engine.supports({ resource }) }));
  emit(new OutputFormatter().formatSupports(entries, format), options.output);
}

async function runEstimate(files: string[], options: CommonOptions): Promise<void> {
  const format = outputFormat(options.format);
  const engine = createEngine(options);
  const requests = await InputLoader.loadEstimateRequests(files);

  const entries: EstimateEntry[] = requests.map(request => ({
    resourceType: request.resourceType,
    estimate: engine.estimateCost(request),
  }));
  emit(new OutputFormatter().formatEstimates(entries, format), options.output);
}

function actualCostLabel(request: ActualCostRequest, index: number): string {
  if (request.arn) return request.arn;
  if (request.resourceId && !request.resourceId.trim().startsWith('{')) return request.resourceId;
  return `request #${index + 1}`;
}

program.parseAsync(process.argv).catch(error => {
  console.error(chalk.red('Error:'), errorMessage(error));
  process.exit(1);
});
