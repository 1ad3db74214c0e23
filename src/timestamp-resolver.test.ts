import { describe, it, expect } from 'vitest';
import {
  determineConfidence,
  formatSourceWithConfidence,
  parseTagTimestamp,
  resolveTimestamps,
  runtimeHours,
} from './timestamp-resolver';

const NOW = new Date('2025-03-10T12:00:00Z');
const now = () => NOW;

describe('resolveTimestamps', () => {
  const start = new Date('2025-03-01T00:00:00Z');
  const end = new Date('2025-03-02T00:00:00Z');

  it('prefers explicit start and end over the creation tag', () => {
    const resolution = resolveTimestamps(
      { start, end, tags: { 'pulumi:created': '2024-01-01T00:00:00Z' } },
      now,
    );
    expect(resolution).toEqual({ start, end, source: 'explicit', isImported: false });
  });

  it('defaults the end to now for an explicit start', () => {
    const resolution = resolveTimestamps({ start }, now);
    expect(resolution.end).toBe(NOW);
    expect(resolution.source).toBe('mixed');
  });

  it('uses the creation tag when no start is given', () => {
    const resolution = resolveTimestamps({ tags: { 'pulumi:created': '2025-02-01T08:30:00Z' } }, now);
    expect(resolution.start.toISOString()).toBe('2025-02-01T08:30:00.000Z');
    expect(resolution.end).toBe(NOW);
    expect(resolution.source).toBe('pulumi:created');
  });

  it('is mixed when the start comes from the tag and the end is explicit', () => {
    const resolution = resolveTimestamps({ end, tags: { 'pulumi:created': '2025-02-01T00:00:00Z' } }, now);
    expect(resolution.source).toBe('mixed');
    expect(resolution.end).toBe(end);
  });

  it('never falls back to the modification tag', () => {
    expect(() => resolveTimestamps({ tags: { 'pulumi:modified': '2025-02-01T00:00:00Z' } }, now)).toThrow(
      'start time required: provide explicit Start or pulumi:created tag',
    );
  });

  it.each(['yesterday-ish', '1', 'March 5', '2025-01-01', '2025-01-01 00:00:00Z'])(
    'treats the creation tag %j as absent',
    value => {
      expect(() => resolveTimestamps({ tags: { 'pulumi:created': value } }, now)).toThrow(
        'start time required: provide explicit Start or pulumi:created tag',
      );
    },
  );

  it('reads the imported marker exactly', () => {
    const tags = { 'pulumi:created': '2025-02-01T00:00:00Z' };
    expect(resolveTimestamps({ tags: { ...tags, 'pulumi:external': 'true' } }, now).isImported).toBe(true);
    expect(resolveTimestamps({ tags: { ...tags, 'pulumi:external': 'True' } }, now).isImported).toBe(false);
  });
});

describe('determineConfidence', () => {
  const base = { start: NOW, end: NOW };

  it('is HIGH for explicit windows even when imported', () => {
    expect(determineConfidence({ ...base, source: 'explicit', isImported: true })).toBe('HIGH');
  });

  it('is MEDIUM for tag-derived windows on imported resources', () => {
    expect(determineConfidence({ ...base, source: 'pulumi:created', isImported: true })).toBe('MEDIUM');
    expect(determineConfidence({ ...base, source: 'mixed', isImported: true })).toBe('MEDIUM');
  });

  it('is HIGH for tag-derived windows on native resources', () => {
    expect(determineConfidence({ ...base, source: 'pulumi:created', isImported: false })).toBe('HIGH');
  });

  it('is LOW without a resolution', () => {
    expect(determineConfidence(undefined)).toBe('LOW');
  });
});

describe('formatSourceWithConfidence', () => {
  it('encodes confidence and the imported note', () => {
    expect(formatSourceWithConfidence('aws-public-fallback', 'HIGH', false)).toBe('aws-public-fallback[confidence:HIGH]');
    expect(formatSourceWithConfidence('aws-public-fallback', 'MEDIUM', true)).toBe(
      'aws-public-fallback[confidence:MEDIUM] imported resource',
    );
  });
});

describe('helpers', () => {
  it('parses RFC 3339 timestamps only', () => {
    expect(parseTagTimestamp('')).toBeUndefined();
    expect(parseTagTimestamp('not a date')).toBeUndefined();
    expect(parseTagTimestamp('1')).toBeUndefined();
    expect(parseTagTimestamp('March 5')).toBeUndefined();
    expect(parseTagTimestamp('2025-01-01T00:00:00Z')?.getTime()).toBe(Date.UTC(2025, 0, 1));
    expect(parseTagTimestamp(' 2025-01-01T05:30:00+05:30 ')?.getTime()).toBe(Date.UTC(2025, 0, 1));
  });

  it('computes runtime hours', () => {
    expect(runtimeHours({ start: new Date('2025-01-01T00:00:00Z'), end: new Date('2025-01-02T06:00:00Z') })).toBe(30);
  });
});
