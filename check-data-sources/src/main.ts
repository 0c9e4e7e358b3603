#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { Command } from 'commander';
import { formatResult, runChecks } from './checkRunner.js';
import type { DataProvider } from './dataProvider.js';
import { logger } from './logger.js';
import { matchesSchedule } from './schedule.js';
import { createProvider, loadSourcesConfig, type SourcesConfig } from './sourceConfig.js';

export type ExitCode = 0 | 1 | 2;

type CheckOptions = {
  readonly config?: string;
  readonly ignoreSchedule?: boolean;
};

async function loadConfig(configPath: string | undefined): Promise<SourcesConfig | null> {
  try {
    return await loadSourcesConfig(configPath);
  } catch (error) {
    logger.debug({ error }, 'Failed to load configuration');
    // eslint-disable-next-line no-console
    console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}

function selectProviders(config: SourcesConfig, ids: readonly string[]): DataProvider[] | null {
  if (ids.length === 0) {
    return config.sources.map(createProvider);
  }

  const selected: DataProvider[] = [];
  for (const id of ids) {
    const source = config.sources.find(s => s.id === id);
    if (!source) {
      // eslint-disable-next-line no-console
      console.error(`ERROR: Unknown data source "${id}"`);
      return null;
    }
    selected.push(createProvider(source));
  }
  return selected;
}

async function runCheck(ids: readonly string[], options: CheckOptions): Promise<ExitCode> {
  const config = await loadConfig(options.config);
  if (!config) {
    return 1;
  }

  if (options.ignoreSchedule !== true && !matchesSchedule(config.schedule)) {
    // eslint-disable-next-line no-console
    console.log(`⊘ Outside schedule "${config.schedule}", skipping`);
    return 2;
  }

  const providers = selectProviders(config, ids);
  if (!providers) {
    return 1;
  }

  // eslint-disable-next-line no-console
  console.log(`=== Checking ${String(providers.length)} data source(s) ===`);

  const report = await runChecks(providers);
  for (const result of report.results) {
    // eslint-disable-next-line no-console
    console.log(formatResult(result));
  }

  // eslint-disable-next-line no-console
  console.log(
    `\n${String(report.passed)} passed, ${String(report.failed)} empty, ${String(report.errored)} unavailable`
  );

  return report.exitCode;
}

async function runList(options: CheckOptions): Promise<ExitCode> {
  const config = await loadConfig(options.config);
  if (!config) {
    return 1;
  }

  for (const source of config.sources) {
    // eslint-disable-next-line no-console
    console.log(`${source.id}\t${source.kind}\t${source.location}`);
  }
  return 0;
}

/**
 * Commander-based CLI entrypoint.
 */
export async function main(argv: string[]): Promise<ExitCode> {
  const program = new Command();
  let code: ExitCode = 0;

  program
    .name('check-data-sources')
    .description('Verify that the configured points, playing and forecast data sources return data')
    .version('0.1.0')
    .option('--config <path>', 'data source configuration file (default: $DATA_SOURCES_CONFIG or data-sources.json)');

  program
    .command('list')
    .description('Print configured data sources, one per line')
    .action(async () => {
      code = await runList(program.opts<CheckOptions>());
    });

  program
    .command('check', { isDefault: true })
    .description('Check that each data source returns a non-empty table')
    .argument('[ids...]', 'data source ids to check. If omitted, check every configured source.')
    .option('--ignore-schedule', 'run even outside the configured schedule', false)
    .action(async (ids: string[], options: { ignoreSchedule?: boolean }) => {
      code = await runCheck(ids, { ...program.opts<CheckOptions>(), ...options });
    });

  await program.parseAsync(['node', 'check-data-sources', ...argv]);
  process.exitCode = code;
  return code;
}

/**
 * True when the module at `moduleUrl` is the script node was started with.
 * npm runs bins through a symlink in node_modules/.bin, so the script path
 * is resolved before comparing.
 */
export function isEntrypoint(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (!scriptPath) {
    return false;
  }

  try {
    return moduleUrl === pathToFileURL(realpathSync(scriptPath)).href;
  } catch (error) {
    logger.debug({ error, scriptPath }, 'Could not resolve script path');
    return false;
  }
}

if (isEntrypoint(import.meta.url, process.argv[1])) {
  void main(process.argv.slice(2));
}
