/**
 * Output Formatter
 * Formats engine results for the terminal, as JSON or as markdown
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type {
  ActualCostResult,
  CostEstimate,
  PricingSpec,
  RecommendationsResponse,
  ResourceDescriptor,
  SupportsResult,
} from './types';

export type OutputFormat = 'table' | 'json' | 'markdown';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'markdown'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

export interface ProjectedCostEntry {
  resource: ResourceDescriptor;
  estimate: CostEstimate;
}

export interface ActualCostEntry {
  label: string;
  results: ActualCostResult[];
}

export interface SupportsEntry {
  resource: ResourceDescriptor;
  result: SupportsResult;
}

export interface EstimateEntry {
  resourceType: string;
  estimate: CostEstimate;
}

/**
 * Format currency value
 */
export function formatCurrency(value: number): string {
  if (value < 0.01 && value > 0) {
    return '<$0.01';
  }
  return '$' + value.toFixed(2);
}

/**
 * Format a per-unit rate, keeping small rates readable
 */
export function formatRate(value: number): string {
  if (value === 0) return '$0';
  return value < 0.01 ? `$${value.toPrecision(4)}` : `$${value.toFixed(4)}`;
}

function resourceLabel(resource: ResourceDescriptor): string {
  const sku = resource.sku ? ` (${resource.sku})` : '';
  return `${resource.name ?? resource.id ?? resource.resourceType}${sku}`;
}

function header(...titles: string[]): string[] {
  return titles.map(title => chalk.bold.white(title));
}

function formatQuantity(quantity: number): string {
  if (quantity >= 1000000) return `${(quantity / 1000000).toFixed(1)}M`;
  if (quantity >= 1000) return `${(quantity / 1000).toFixed(1)}k`;
  return quantity % 1 !== 0 ? quantity.toFixed(2) : quantity.toString();
}

export class OutputFormatter {
  formatProjected(entries: ProjectedCostEntry[], format: OutputFormat = 'table'): string {
    switch (format) {
      case 'json':
        return JSON.stringify(entries, null, 2);
      case 'markdown':
        return this.formatProjectedMarkdown(entries);
      case 'table':
      default:
        return this.formatProjectedTable(entries);
    }
  }

  formatActual(entries: ActualCostEntry[], format: OutputFormat = 'table'): string {
    switch (format) {
      case 'json':
        return JSON.stringify(entries, null, 2);
      case 'markdown':
        return this.formatActualMarkdown(entries);
      case 'table':
      default:
        return this.formatActualTable(entries);
    }
  }

  formatPricingSpecs(specs: PricingSpec[], format: OutputFormat = 'table'): string {
    switch (format) {
      case 'json':
        return JSON.stringify(specs, null, 2);
      case 'markdown':
        return specs.map(spec => this.formatPricingSpecMarkdown(spec)).join('\n\n');
      case 'table':
      default:
        return specs.map(spec => this.formatPricingSpecTable(spec)).join('\n\n');
    }
  }

  formatRecommendations(response: RecommendationsResponse, format: OutputFormat = 'table'): string {
    switch (format) {
      case 'json':
        return JSON.stringify(response, null, 2);
      case 'markdown':
        return this.formatRecommendationsMarkdown(response);
      case 'table':
      default:
        return this.formatRecommendationsTable(response);
    }
  }

  formatSupports(entries: SupportsEntry[], format: OutputFormat = 'table'): string {
    if (format === 'json') {
      return JSON.stringify(entries, null, 2);
    }

    const rows = entries.map(({ resource, result }) => [
      resource.resourceType,
      resource.region || '-',
      result.supported ? 'yes' : 'no',
      result.supportedMetrics.join(', ') || '-',
      result.reason || '-',
    ]);

    if (format === 'markdown') {
      return [
        '| Resource Type | Region | Supported | Metrics | Reason |',
        '|---------------|--------|-----------|---------|--------|',
        ...rows.map(row => `| ${row.join(' | ')} |`),
      ].join('\n');
    }

    const table = new Table({
      head: header('Resource Type', 'Region', 'Supported', 'Metrics', 'Reason'),
      style: { head: [], border: [] },
      wordWrap: true,
    });
    for (const row of rows) {
      table.push([row[0], row[1], row[2] === 'yes' ? chalk.green('yes') : chalk.red('no'), row[3], row[4]]);
    }
    return table.toString();
  }

  formatEstimates(entries: EstimateEntry[], format: OutputFormat = 'table'): string {
    if (format === 'json') {
      return JSON.stringify(entries, null, 2);
    }

    const total = entries.reduce((sum, entry) => sum + entry.estimate.monthlyCost, 0);

    if (format === 'markdown') {
      const lines = ['| Resource Type | Monthly Cost | Detail |', '|---------------|-------------:|--------|'];
      for (const { resourceType, estimate } of entries) {
        lines.push(`| ${resourceType} | ${formatCurrency(estimate.monthlyCost)} | ${estimate.billingDetail} |`);
      }
      lines.push('');
      lines.push(`**💰 Total Monthly Cost: ${formatCurrency(total)}**`);
      return lines.join('\n');
    }

    const table = new Table({
      head: header('Resource Type', 'Monthly Cost', 'Detail'),
      style: { head: [], border: [] },
      colWidths: [40, 15, 60],
      wordWrap: true,
    });
    for (const { resourceType, estimate } of entries) {
      table.push([resourceType, formatCurrency(estimate.monthlyCost), chalk.gray(estimate.billingDetail)]);
    }
    return [table.toString(), '', chalk.bold(`   💰 Total Monthly Cost: ${chalk.green(formatCurrency(total))}`)].join('\n');
  }

  /**
   * Projected costs as a CLI table with a component breakdown per resource
   */
  private formatProjectedTable(entries: ProjectedCostEntry[]): string {
    const output: string[] = [];
    const table = new Table({
      head: header('Resource', 'Monthly Qty', 'Unit', 'Monthly Cost'),
      style: { head: [], border: [] },
      colWidths: [50, 15, 15, 15],
      wordWrap: true,
    });

    const sorted = [...entries].sort((a, b) => b.estimate.monthlyCost - a.estimate.monthlyCost);
    for (const { resource, estimate } of sorted) {
      table.push([
        { content: chalk.bold(resourceLabel(resource)), colSpan: 3 },
        chalk.bold(formatCurrency(estimate.monthlyCost)),
      ]);

      if (estimate.components.length === 0) {
        table.push([{ content: chalk.gray(`  └─ ${estimate.billingDetail}`), colSpan: 4 }]);
        continue;
      }

      for (const [index, component] of estimate.components.entries()) {
        const treeSymbol = index === estimate.components.length - 1 ? '└─' : '├─';
        table.push([
          chalk.gray(`  ${treeSymbol} ${component.component}`),
          chalk.gray(formatQuantity(component.quantity)),
          chalk.gray(component.unit),
          chalk.gray(formatCurrency(component.monthlyCost)),
        ]);
      }
    }

    output.push(table.toString());
    output.push('');

    const total = entries.reduce((sum, entry) => sum + entry.estimate.monthlyCost, 0);
    output.push(chalk.bold(`   💰 Total Monthly Cost: ${chalk.green(formatCurrency(total))}`));
    output.push(chalk.gray(`   📅 Estimated Annual: ${formatCurrency(total * 12)}`));

    return output.join('\n');
  }

  private formatProjectedMarkdown(entries: ProjectedCostEntry[]): string {
    const lines: string[] = [];
    lines.push('| Resource | Monthly Qty | Unit | Monthly Cost |');
    lines.push('|----------|------------:|------|-------------:|');

    const sorted = [...entries].sort((a, b) => b.estimate.monthlyCost - a.estimate.monthlyCost);
    for (const { resource, estimate } of sorted) {
      lines.push(`| **${resourceLabel(resource)}** | | | **${formatCurrency(estimate.monthlyCost)}** |`);
      for (const component of estimate.components) {
        lines.push(
          `| &nbsp;&nbsp; └─ ${component.component} | ${formatQuantity(component.quantity)} | ${component.unit} | ${formatCurrency(component.monthlyCost)} |`,
        );
      }
    }

    const total = entries.reduce((sum, entry) => sum + entry.estimate.monthlyCost, 0);
    lines.push('');
    lines.push(`**💰 Total Monthly Cost: ${formatCurrency(total)}**`);
    lines.push(`📅 Estimated Annual: ${formatCurrency(total * 12)}`);
    return lines.join('\n');
  }

  private formatActualTable(entries: ActualCostEntry[]): string {
    const table = new Table({
      head: header('Resource', 'Period Start', 'Hours', 'Cost', 'Source'),
      style: { head: [], border: [] },
      colWidths: [30, 26, 10, 12, 60],
      wordWrap: true,
    });

    let total = 0;
    for (const { label, results } of entries) {
      for (const result of results) {
        total += result.cost;
        table.push([
          label,
          result.timestamp.toISOString(),
          result.usageAmount.toFixed(2),
          formatCurrency(result.cost),
          chalk.gray(result.source),
        ]);
      }
    }

    return [table.toString(), '', chalk.bold(`   💰 Total Actual Cost: ${chalk.green(formatCurrency(total))}`)].join('\n');
  }

  private formatActualMarkdown(entries: ActualCostEntry[]): string {
    const lines = ['| Resource | Period Start | Hours | Cost | Source |', '|----------|--------------|------:|-----:|--------|'];
    let total = 0;
    for (const { label, results } of entries) {
      for (const result of results) {
        total += result.cost;
        lines.push(
          `| ${label} | ${result.timestamp.toISOString()} | ${result.usageAmount.toFixed(2)} | ${formatCurrency(result.cost)} | ${result.source} |`,
        );
      }
    }
    lines.push('');
    lines.push(`**💰 Total Actual Cost: ${formatCurrency(total)}**`);
    return lines.join('\n');
  }

  private formatPricingSpecTable(spec: PricingSpec): string {
    const output: string[] = [];
    output.push(chalk.bold.cyan(`${spec.resourceType}${spec.sku ? ` (${spec.sku})` : ''} in ${spec.region}`));
    output.push(chalk.gray(`   ${spec.description}`));

    const table = new Table({ style: { head: [], border: [] } });
    table.push(
      { [chalk.bold('Billing Mode')]: spec.billingMode },
      { [chalk.bold('Rate')]: `${formatRate(spec.ratePerUnit)}${spec.unit ? ` per ${spec.unit}` : ''}` },
      { [chalk.bold('Source')]: spec.source },
    );
    output.push(table.toString());

    if (spec.assumptions.length > 0) {
      output.push(chalk.bold('   Assumptions:'));
      for (const assumption of spec.assumptions) {
        output.push(chalk.gray(`   • ${assumption}`));
      }
    }
    return output.join('\n');
  }

  private formatPricingSpecMarkdown(spec: PricingSpec): string {
    const lines: string[] = [];
    lines.push(`### ${spec.resourceType}${spec.sku ? ` (${spec.sku})` : ''} in ${spec.region}`);
    lines.push(`> ${spec.description}`);
    lines.push('');
    lines.push('| Field | Value |');
    lines.push('|-------|-------|');
    lines.push(`| Billing Mode | ${spec.billingMode} |`);
    lines.push(`| Rate | ${formatRate(spec.ratePerUnit)}${spec.unit ? ` per ${spec.unit}` : ''} |`);
    lines.push(`| Source | ${spec.source} |`);
    if (spec.assumptions.length > 0) {
      lines.push('');
      for (const assumption of spec.assumptions) {
        lines.push(`- ${assumption.trim()}`);
      }
    }
    return lines.join('\n');
  }

  private formatRecommendationsTable(response: RecommendationsResponse): string {
    const output: string[] = [];

    if (response.recommendations.length > 0) {
      const table = new Table({
        head: header('Resource', 'Change', 'Priority', 'Monthly Savings', 'Description'),
        style: { head: [], border: [] },
        colWidths: [28, 34, 10, 17, 60],
        wordWrap: true,
      });

      for (const recommendation of response.recommendations) {
        const savings = recommendation.impact?.estimatedSavings ?? 0;
        table.push([
          recommendation.resource.name ?? recommendation.resource.id ?? recommendation.resource.resourceType,
          `${recommendation.resource.sku} → ${recommendation.recommendedConfig.instance_type ?? recommendation.recommendedConfig.volume_type ?? '-'}`,
          this.colorPriority(recommendation.priority),
          savings > 0 ? chalk.green(formatCurrency(savings)) : chalk.gray(formatCurrency(savings)),
          chalk.gray(recommendation.description),
        ]);
      }
      output.push(table.toString());
    } else {
      output.push(chalk.gray('No recommendations'));
    }

    output.push('');
    output.push(
      chalk.bold(
        `   💡 ${response.summary.totalRecommendations} recommendation(s), estimated savings ${chalk.green(
          formatCurrency(response.summary.totalEstimatedSavings),
        )}/month`,
      ),
    );
    return output.join('\n');
  }

  private formatRecommendationsMarkdown(response: RecommendationsResponse): string {
    const lines: string[] = [];
    lines.push('| Resource | Change | Priority | Monthly Savings | Description |');
    lines.push('|----------|--------|----------|----------------:|-------------|');
    for (const recommendation of response.recommendations) {
      const target = recommendation.recommendedConfig.instance_type ?? recommendation.recommendedConfig.volume_type ?? '-';
      const name = recommendation.resource.name ?? recommendation.resource.id ?? recommendation.resource.resourceType;
      lines.push(
        `| ${name} | ${recommendation.resource.sku} → ${target} | ${recommendation.priority} | ${formatCurrency(recommendation.impact?.estimatedSavings ?? 0)} | ${recommendation.description} |`,
      );
    }
    lines.push('');
    lines.push(
      `**💡 ${response.summary.totalRecommendations} recommendation(s), estimated savings ${formatCurrency(response.summary.totalEstimatedSavings)}/month**`,
    );
    return lines.join('\n');
  }

  /**
   * Color code recommendation priority
   */
  private colorPriority(priority: 'HIGH' | 'MEDIUM' | 'LOW'): string {
    switch (priority) {
      case 'HIGH':
        return chalk.red('HIGH');
      case 'MEDIUM':
        return chalk.yellow('MEDIUM');
      case 'LOW':
        return chalk.gray('LOW');
    }
  }
}
