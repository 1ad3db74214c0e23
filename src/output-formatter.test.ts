import { describe, it, expect } from 'vitest';
import { OutputFormatter, formatCurrency, formatRate, isOutputFormat, type ProjectedCostEntry } from './output-formatter';
import type { PricingSpec, RecommendationsResponse } from './types';

const projected: ProjectedCostEntry[] = [
  {
    resource: { provider: 'aws', resourceType: 'ec2', sku: 't3.micro', region: 'us-east-1', tags: {}, name: 'web' },
    estimate: {
      monthlyCost: 7.592,
      unitPrice: 0.0104,
      currency: 'USD',
      billingDetail: 'On-demand Linux, Shared tenancy, 730 hrs/month',
      components: [{ component: 'Compute', quantity: 730, unitPrice: 0.0104, monthlyCost: 7.592, unit: 'hours' }],
    },
  },
];

const emptyResponse: RecommendationsResponse = {
  recommendations: [],
  summary: {
    totalRecommendations: 0,
    totalEstimatedSavings: 0,
    currency: 'USD',
    projectionPeriod: 'monthly',
    countByCategory: {},
    countByActionType: {},
  },
};

describe('formatCurrency', () => {
  it('shows sub-cent amounts as <$0.01', () => {
    expect(formatCurrency(0.004)).toBe('<$0.01');
    expect(formatCurrency(0)).toBe('$0.00');
    expect(formatCurrency(7.592)).toBe('$7.59');
  });
});

describe('formatRate', () => {
  it('keeps four decimals or four significant digits', () => {
    expect(formatRate(0.0104)).toBe('$0.0104');
    expect(formatRate(0.004)).toBe('$0.004000');
    expect(formatRate(0)).toBe('$0');
  });
});

describe('isOutputFormat', () => {
  it('accepts only known formats', () => {
    expect(isOutputFormat('markdown')).toBe(true);
    expect(isOutputFormat('github')).toBe(false);
  });
});

describe('OutputFormatter', () => {
  const formatter = new OutputFormatter();

  it('renders projected costs as markdown', () => {
    expect(formatter.formatProjected(projected, 'markdown').split('\n')).toEqual([
      '| Resource | Monthly Qty | Unit | Monthly Cost |',
      '|----------|------------:|------|-------------:|',
      '| **web (t3.micro)** | | | **$7.59** |',
      '| &nbsp;&nbsp; └─ Compute | 730 | hours | $7.59 |',
      '',
      '**💰 Total Monthly Cost: $7.59**',
      '📅 Estimated Annual: $91.10',
    ]);
  });

  it('renders projected costs as a table with totals', () => {
    const output = formatter.formatProjected(projected, 'table');
    expect(output).toContain('web (t3.micro)');
    expect(output).toContain('Total Monthly Cost:');
    expect(output).toContain('Estimated Annual: $91.10');
  });

  it('emits JSON unchanged', () => {
    expect(JSON.parse(formatter.formatProjected(projected, 'json'))).toEqual(projected);
  });

  it('lists pricing spec assumptions in markdown', () => {
    const spec: PricingSpec = {
      provider: 'aws',
      resourceType: 'ebs',
      sku: 'gp3',
      region: 'us-east-1',
      billingMode: 'per_gb_month',
      ratePerUnit: 0.08,
      currency: 'USD',
      unit: 'GB-month',
      description: 'EBS gp3 volume storage',
      assumptions: ['Size from the size tag'],
      source: 'aws-public',
    };
    expect(formatter.formatPricingSpecs([spec], 'markdown').split('\n')).toEqual([
      '### ebs (gp3) in us-east-1',
      '> EBS gp3 volume storage',
      '',
      '| Field | Value |',
      '|-------|-------|',
      '| Billing Mode | per_gb_month |',
      '| Rate | $0.0800 per GB-month |',
      '| Source | aws-public |',
      '',
      '- Size from the size tag',
    ]);
  });

  it('summarizes an empty recommendation response', () => {
    expect(formatter.formatRecommendations(emptyResponse, 'markdown').split('\n')).toEqual([
      '| Resource | Change | Priority | Monthly Savings | Description |',
      '|----------|--------|----------|----------------:|-------------|',
      '',
      '**💡 0 recommendation(s), estimated savings $0.00/month**',
    ]);
  });

  it('renders support checks as markdown rows', () => {
    const output = formatter.formatSupports(
      [
        {
          resource: { provider: 'aws', resourceType: 'ec2', sku: 't3.micro', region: 'us-east-1', tags: {} },
          result: { supported: true, reason: '', supportedMetrics: ['carbon_footprint'] },
        },
      ],
      'markdown',
    );
    expect(output.split('\n')[2]).toBe('| ec2 | us-east-1 | yes | carbon_footprint | - |');
  });

  it('totals estimates in markdown', () => {
    const output = formatter.formatEstimates(
      [
        {
          resourceType: 'aws:ebs/volume:Volume',
          estimate: { monthlyCost: 0.8, unitPrice: 0.1, currency: 'USD', billingDetail: 'gp2 volume, 8 GB', components: [] },
        },
      ],
      'markdown',
    );
    expect(output.split('\n')).toEqual([
      '| Resource Type | Monthly Cost | Detail |',
      '|---------------|-------------:|--------|',
      '| aws:ebs/volume:Volume | $0.80 | gp2 volume, 8 GB |',
      '',
      '**💰 Total Monthly Cost: $0.80**',
    ]);
  });
});
