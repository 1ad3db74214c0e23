/**
 * Timestamp Resolver
 * Resolves the billing window for an actual-cost query and how far it can
 * be trusted.
 *
 * Priority:
 *   1. explicit start + end           -> "explicit"
 *   2. explicit start, no end         -> end = now, "mixed"
 *   3. pulumi:created tag as start    -> "pulumi:created" (end = now) or "mixed" (explicit end)
 *   4. nothing                        -> "start time required"
 *
 * Only the creation tag is a fallback; the modification tag is never read.
 */

import type { ConfidenceLevel, TimestampResolution, TimestampSource } from './types';

export const CREATED_TAG = 'pulumi:created';
export const IMPORTED_TAG = 'pulumi:external';

export interface TimestampInput {
  start?: Date;
  end?: Date;
  tags?: Readonly<Record<string, string>>;
}

export class TimestampResolutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimestampResolutionError';
  }
}

export const RFC3339_PATTERN = /^\d{4}-\d{2}-\d{2}[Tt]\d{2}:\d{2}:\d{2}(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/;

/**
 * Parse an RFC 3339 timestamp; anything else is undefined
 */
export function parseRfc3339(value: string | undefined): Date | undefined {
  const trimmed = value?.trim();
  if (!trimmed || !RFC3339_PATTERN.test(trimmed)) return undefined;
  const parsed = new Date(trimmed);
  return isNaN(parsed.getTime()) ? undefined : parsed;
}

/**
 * Parse the creation tag; invalid values count as absent
 */
export function parseTagTimestamp(value: string | undefined): Date | undefined {
  return parseRfc3339(value);
}

export function isImportedResource(tags: Readonly<Record<string, string>> | undefined): boolean {
  return tags?.[IMPORTED_TAG] === 'true';
}

export function resolveTimestamps(input: TimestampInput, now: () => Date = () => new Date()): TimestampResolution {
  const isImported = isImportedResource(input.tags);

  let start: Date;
  let source: TimestampSource;

  if (input.start) {
    start = input.start;
    source = 'explicit';
  } else {
    const created = parseTagTimestamp(input.tags?.[CREATED_TAG]);
    if (!created) {
      throw new TimestampResolutionError('start time required: provide explicit Start or pulumi:created tag');
    }
    start = created;
    source = 'pulumi:created';
  }

  let end: Date;
  if (input.end) {
    end = input.end;
    if (source === 'pulumi:created') source = 'mixed';
  } else {
    end = now();
    if (source === 'explicit') source = 'mixed';
  }

  return { start, end, source, isImported };
}

export function determineConfidence(resolution: TimestampResolution | undefined): ConfidenceLevel {
  if (!resolution) return 'LOW';
  if (resolution.source === 'explicit') return 'HIGH';
  return resolution.isImported ? 'MEDIUM' : 'HIGH';
}

/**
 * Source label carried by actual-cost results
 */
export function formatSourceWithConfidence(base: string, confidence: ConfidenceLevel, isImported: boolean): string {
  const label = `${base}[confidence:${confidence}]`;
  return isImported ? `${label} imported resource` : label;
}

export function runtimeHours(resolution: Pick<TimestampResolution, 'start' | 'end'>): number {
  return (resolution.end.getTime() - resolution.start.getTime()) / 3_600_000;
}
