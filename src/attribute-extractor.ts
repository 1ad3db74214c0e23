/**
 * Attribute Extractor
 * Typed, defaulted attributes read from a flat tag map or a structured
 * attribute document. Both sources go through the same AttributeReader
 * interface, so every extractor behaves identically for either.
 *
 * Extraction never fails: unrecognized values fall back to documented
 * defaults and invalid numbers are logged and treated as absent.
 */

import type { Logger } from './logger';
import type { Architecture, OperatingSystem, Tenancy } from './pricing-data';
import type { AttributeValue } from './types';

export interface AttributeReader {
  /** True when the key is present, even with an empty value */
  has(key: string): boolean;
  /** Trimmed, non-empty text form of the value */
  getString(key: string): string | undefined;
  /** Untrimmed text form of the value, including empty strings */
  getText(key: string): string | undefined;
  /** Numeric value; numbers and numeric strings are both accepted */
  getNumber(key: string): number | undefined;
}

/** Plain decimal or exponent notation, nothing else */
export const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

abstract class BaseAttributeReader implements AttributeReader {
  constructor(protected readonly logger: Logger) {}

  protected abstract raw(key: string): AttributeValue | undefined;

  has(key: string): boolean {
    const value = this.raw(key);
    return value !== undefined && value !== null;
  }

  getText(key: string): string | undefined {
    const value = this.raw(key);
    if (value === undefined || value === null) return undefined;
    return String(value);
  }

  getString(key: string): string | undefined {
    const trimmed = this.getText(key)?.trim();
    return trimmed ? trimmed : undefined;
  }

  getNumber(key: string): number | undefined {
    const value = this.raw(key);
    if (value === undefined || value === null) return undefined;

    if (typeof value === 'number') {
      if (Number.isFinite(value)) return value;
      this.logger.warn({ attribute: key, value: String(value) }, 'non-finite numeric attribute treated as absent');
      return undefined;
    }

    const text = String(value).trim();
    if (text === '') return undefined;
    if (typeof value === 'string' && NUMERIC_PATTERN.test(text)) {
      return parseFloat(text);
    }

    this.logger.warn({ attribute: key, value: text }, 'invalid numeric attribute treated as absent');
    return undefined;
  }
}

/**
 * Reader over a flat string-to-string tag map
 */
export class TagAttributes extends BaseAttributeReader {
  constructor(private readonly tags: Readonly<Record<string, string>>, logger: Logger) {
    super(logger);
  }

  protected raw(key: string): AttributeValue | undefined {
    return Object.prototype.hasOwnProperty.call(this.tags, key) ? this.tags[key] : undefined;
  }
}

/**
 * Reader over a structured attribute document (string, number and boolean values)
 */
export class StructuredAttributes extends BaseAttributeReader {
  constructor(private readonly attributes: Readonly<Record<string, AttributeValue>>, logger: Logger) {
    super(logger);
  }

  protected raw(key: string): AttributeValue | undefined {
    return Object.prototype.hasOwnProperty.call(this.attributes, key) ? this.attributes[key] : undefined;
  }
}

// Normalization tables

export function normalizePlatform(value: string | undefined): OperatingSystem {
  switch (value?.trim().toLowerCase()) {
    case 'windows':
      return 'Windows';
    case 'rhel':
    case 'red hat enterprise linux':
      return 'RHEL';
    case 'suse':
    case 'sles':
      return 'SUSE';
    default:
      return 'Linux';
  }
}

export function normalizeTenancy(value: string | undefined): Tenancy {
  switch (value?.trim().toLowerCase()) {
    case 'dedicated':
      return 'Dedicated';
    case 'host':
      return 'Host';
    default:
      return 'Shared';
  }
}

export function normalizeArchitecture(value: string | undefined): Architecture {
  const lowered = value?.trim().toLowerCase();
  return lowered === 'arm64' || lowered === 'arm' ? 'arm64' : 'x86_64';
}

const RDS_ENGINE_NAMES: Record<string, string> = {
  mysql: 'MySQL',
  postgres: 'PostgreSQL',
  postgresql: 'PostgreSQL',
  mariadb: 'MariaDB',
  oracle: 'Oracle',
  'oracle-se2': 'Oracle',
  sqlserver: 'SQL Server',
  'sqlserver-ex': 'SQL Server',
  'sql-server': 'SQL Server',
};

export const DEFAULT_RDS_ENGINE = 'MySQL';
export const RDS_STORAGE_TYPES = new Set(['gp2', 'gp3', 'io1', 'io2', 'standard']);

// SKU tag keys in priority order
const SKU_TAG_KEYS = ['instanceType', 'instance_class', 'instanceClass', 'type', 'volumeType', 'volume_type'];

/**
 * First SKU-like tag value, in priority order
 */
export function extractSku(reader: AttributeReader): string {
  for (const key of SKU_TAG_KEYS) {
    const value = reader.getString(key);
    if (value) return value;
  }
  return '';
}

export function skuTagKeys(): readonly string[] {
  return SKU_TAG_KEYS;
}

/**
 * Region from an explicit region attribute or an availability zone
 */
export function extractRegion(reader: AttributeReader): string {
  const region = reader.getString('region');
  if (region) return region;

  const zone = reader.getString('availabilityZone');
  if (zone && zone.length > 1) {
    return zone.slice(0, -1);
  }
  return '';
}

// Per-service attribute bags

export interface ComputeAttributes {
  os: OperatingSystem;
  tenancy: Tenancy;
}

export function extractComputeAttributes(reader: AttributeReader): ComputeAttributes {
  return {
    os: normalizePlatform(reader.getString('platform')),
    tenancy: normalizeTenancy(reader.getString('tenancy')),
  };
}

export interface SizedStorageAttributes {
  sizeGb: number;
  sizeDefaulted: boolean;
}

function readNonNegative(reader: AttributeReader, key: string, logger: Logger): number | undefined {
  const value = reader.getNumber(key);
  if (value !== undefined && value < 0) {
    logger.warn({ attribute: key, value }, 'negative numeric attribute treated as absent');
    return undefined;
  }
  return value;
}

export function extractVolumeAttributes(reader: AttributeReader, logger: Logger): SizedStorageAttributes {
  const size = readNonNegative(reader, 'size', logger) ?? readNonNegative(reader, 'volume_size', logger);
  return size === undefined ? { sizeGb: 8, sizeDefaulted: true } : { sizeGb: size, sizeDefaulted: false };
}

export function extractObjectStorageAttributes(reader: AttributeReader, logger: Logger): SizedStorageAttributes {
  const size = readNonNegative(reader, 'size', logger);
  return size === undefined ? { sizeGb: 1, sizeDefaulted: true } : { sizeGb: size, sizeDefaulted: false };
}

export interface DatabaseAttributes {
  engine: string;
  engineDefaulted: boolean;
  storageType: string;
  storageTypeDefaulted: boolean;
  storageSizeGb: number;
  storageSizeDefaulted: boolean;
}

export function extractDatabaseAttributes(reader: AttributeReader, logger: Logger): DatabaseAttributes {
  const rawEngine = reader.getString('engine')?.toLowerCase();
  const engine: string | undefined = rawEngine ? RDS_ENGINE_NAMES[rawEngine] : undefined;

  const rawStorage = reader.getString('storage_type')?.toLowerCase();
  const storageKnown = rawStorage !== undefined && RDS_STORAGE_TYPES.has(rawStorage);

  const size = readNonNegative(reader, 'storage_size', logger);

  return {
    engine: engine ?? DEFAULT_RDS_ENGINE,
    engineDefaulted: engine === undefined,
    storageType: storageKnown && rawStorage ? rawStorage : 'gp2',
    storageTypeDefaulted: !storageKnown,
    storageSizeGb: size ?? 20,
    storageSizeDefaulted: size === undefined,
  };
}

export interface FunctionAttributes {
  memoryMb: number;
  memoryDefaulted: boolean;
  requestsPerMonth: number;
  requestsDefaulted: boolean;
  avgDurationMs: number;
  durationDefaulted: boolean;
  architecture: Architecture;
  architectureDefaulted: boolean;
}

/**
 * Memory comes from the SKU (e.g. "512"); usage comes from attributes
 */
export function extractFunctionAttributes(sku: string, reader: AttributeReader, logger: Logger): FunctionAttributes {
  const memory = /^\d+$/.test(sku.trim()) ? parseInt(sku.trim(), 10) : NaN;
  const requests = readNonNegative(reader, 'requests_per_month', logger);
  const duration = readNonNegative(reader, 'avg_duration_ms', logger);
  const arch = reader.getString('arch') ?? reader.getString('architecture');

  return {
    memoryMb: memory > 0 ? memory : 128,
    memoryDefaulted: !(memory > 0),
    requestsPerMonth: requests ?? 0,
    requestsDefaulted: requests === undefined,
    avgDurationMs: duration ?? 100,
    durationDefaulted: duration === undefined,
    architecture: normalizeArchitecture(arch),
    architectureDefaulted: arch === undefined,
  };
}

export type TableCapacityMode = 'on-demand' | 'provisioned';

export interface TableAttributes {
  mode: TableCapacityMode;
  storageGb: number;
  readCapacityUnits: number;
  writeCapacityUnits: number;
  readRequestsPerMonth: number;
  writeRequestsPerMonth: number;
}

export function extractTableAttributes(sku: string, reader: AttributeReader, logger: Logger): TableAttributes {
  const mode: TableCapacityMode = sku.trim().toLowerCase() === 'provisioned' ? 'provisioned' : 'on-demand';
  const read = (key: string): number => readNonNegative(reader, key, logger) ?? 0;

  return {
    mode,
    storageGb: read('storage_gb'),
    readCapacityUnits: Math.floor(read('read_capacity_units')),
    writeCapacityUnits: Math.floor(read('write_capacity_units')),
    readRequestsPerMonth: Math.floor(read('read_requests_per_month')),
    writeRequestsPerMonth: Math.floor(read('write_requests_per_month')),
  };
}

export interface LoadBalancerAttributes {
  kind: 'alb' | 'nlb';
  capacityUnits: number;
}

export function extractLoadBalancerAttributes(sku: string, reader: AttributeReader, logger: Logger): LoadBalancerAttributes {
  const lowered = sku.toLowerCase();
  const kind = lowered.includes('nlb') || lowered.includes('network') ? 'nlb' : 'alb';
  const specificKey = kind === 'nlb' ? 'nlcu_per_hour' : 'lcu_per_hour';

  const capacityUnits =
    readNonNegative(reader, specificKey, logger) ?? readNonNegative(reader, 'capacity_units', logger) ?? 0;

  return { kind, capacityUnits };
}

export interface CacheAttributes {
  engine: string;
}

export function extractCacheAttributes(reader: AttributeReader): CacheAttributes {
  return { engine: reader.getString('engine')?.toLowerCase() ?? 'redis' };
}
