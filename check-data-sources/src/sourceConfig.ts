import { readFile } from 'node:fs/promises';
import type { DataProvider, SourceFormat, SourceKind, SourceOptions } from './dataProvider.js';
import { ConfigError } from './errors.js';
import { FileTableProvider } from './fileProvider.js';
import { HttpTableProvider } from './httpProvider.js';

/**
 * Declaration of one data source in the configuration file.
 */
export interface SourceConfig extends SourceOptions {
  readonly kind: SourceKind;
}

export interface SourcesConfig {
  /** Cron expression gating when checks run, or "at any time". */
  readonly schedule: string;
  readonly sources: readonly SourceConfig[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(entry: Record<string, unknown>, field: string, where: string): string {
  const value = entry[field];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`${where}: "${field}" must be a non-empty string`);
  }
  return value;
}

function optionalString(entry: Record<string, unknown>, field: string, where: string): string | undefined {
  const value = entry[field];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ConfigError(`${where}: "${field}" must be a string`);
  }
  return value;
}

function parseSource(entry: unknown, index: number): SourceConfig {
  const where = `sources[${String(index)}]`;
  if (!isRecord(entry)) {
    throw new ConfigError(`${where} must be an object`);
  }

  const id = requireString(entry, 'id', where);
  const location = requireString(entry, 'location', where);

  const kind = entry['kind'];
  if (kind !== 'http' && kind !== 'file') {
    throw new ConfigError(`${where}: unsupported kind "${String(kind)}"`);
  }

  const formatRaw = entry['format'];
  let format: SourceFormat | undefined;
  if (formatRaw !== undefined) {
    if (formatRaw !== 'json' && formatRaw !== 'csv') {
      throw new ConfigError(`${where}: unsupported format "${String(formatRaw)}"`);
    }
    format = formatRaw;
  }

  const timeoutRaw = entry['timeoutMs'];
  let timeoutMs: number | undefined;
  if (timeoutRaw !== undefined) {
    if (typeof timeoutRaw !== 'number' || !(timeoutRaw > 0)) {
      throw new ConfigError(`${where}: "timeoutMs" must be a positive number`);
    }
    timeoutMs = timeoutRaw;
  }

  return {
    id,
    name: optionalString(entry, 'name', where) ?? id,
    kind,
    location,
    format,
    recordsPath: optionalString(entry, 'recordsPath', where),
    timeoutMs
  };
}

/**
 * Validate a parsed configuration document.
 */
export function parseSourcesConfig(document: unknown): SourcesConfig {
  if (!isRecord(document)) {
    throw new ConfigError('Configuration must be a JSON object');
  }

  const rawSources = document['sources'];
  if (!Array.isArray(rawSources) || rawSources.length === 0) {
    throw new ConfigError('"sources" must be a non-empty array');
  }

  const sources = rawSources.map((entry: unknown, index) => parseSource(entry, index));

  const ids = new Set<string>();
  for (const source of sources) {
    if (ids.has(source.id)) {
      throw new ConfigError(`Duplicate source id "${source.id}"`);
    }
    ids.add(source.id);
  }

  return {
    schedule: optionalString(document, 'schedule', 'configuration') ?? 'at any time',
    sources
  };
}

/**
 * Load the data source configuration.
 *
 * The path defaults to DATA_SOURCES_CONFIG if set, otherwise ./data-sources.json.
 */
export async function loadSourcesConfig(
  configPath: string = process.env['DATA_SOURCES_CONFIG'] ?? 'data-sources.json'
): Promise<SourcesConfig> {
  const raw = await readFile(configPath, 'utf8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  return parseSourcesConfig(parsed);
}

export function createProvider(source: SourceConfig): DataProvider {
  if (source.kind === 'http') {
    return new HttpTableProvider(source);
  }

  return new FileTableProvider(source);
}
