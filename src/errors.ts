/**
 * Error types
 * Malformed input and region mismatches are thrown; pricing misses never are.
 */

import { randomUUID } from 'crypto';

export type ErrorKind = 'invalid_argument' | 'region_mismatch';

export type ErrorCode = 'INVALID_RESOURCE' | 'UNSUPPORTED_REGION';

export class CostEngineError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    public readonly code: ErrorCode,
    public readonly details: Readonly<Record<string, string>>,
  ) {
    super(message);
    this.name = 'CostEngineError';
  }

  get traceId(): string {
    return this.details.trace_id ?? '';
  }
}

export class InvalidRequestError extends CostEngineError {
  constructor(message: string, traceId: string = newTraceId(), details: Record<string, string> = {}) {
    super(message, 'invalid_argument', 'INVALID_RESOURCE', { ...details, trace_id: traceId });
    this.name = 'InvalidRequestError';
  }
}

export class RegionMismatchError extends CostEngineError {
  constructor(
    public readonly engineRegion: string,
    public readonly resourceRegion: string,
    traceId: string = newTraceId(),
  ) {
    super('region mismatch', 'region_mismatch', 'UNSUPPORTED_REGION', {
      trace_id: traceId,
      plugin_region: engineRegion,
      resource_region: resourceRegion,
      required_region: engineRegion,
    });
    this.name = 'RegionMismatchError';
  }
}

export function newTraceId(): string {
  return randomUUID();
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
