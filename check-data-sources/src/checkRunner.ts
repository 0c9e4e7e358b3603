import { checkNonEmpty } from './dataAvailabilityChecker.js';
import type { DataProvider } from './dataProvider.js';
import { logger } from './logger.js';

export type CheckResult =
  | { readonly id: string; readonly status: 'pass'; readonly rowCount: number }
  | { readonly id: string; readonly status: 'fail'; readonly reason: string }
  | { readonly id: string; readonly status: 'error'; readonly error: Error };

export interface CheckReport {
  readonly results: readonly CheckResult[];
  readonly passed: number;
  readonly failed: number;
  readonly errored: number;
  readonly exitCode: 0 | 1;
}

/**
 * Check each provider in turn. The checker lets provider errors through;
 * they are recorded here as `error` and the remaining providers still run.
 */
export async function runChecks(providers: readonly DataProvider[]): Promise<CheckReport> {
  const results: CheckResult[] = [];

  for (const provider of providers) {
    try {
      const outcome = await checkNonEmpty(provider.producer());
      if (outcome.status === 'pass') {
        results.push({ id: provider.id, status: 'pass', rowCount: outcome.rowCount });
      } else {
        results.push({ id: provider.id, status: 'fail', reason: outcome.reason });
      }
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.debug({ provider: provider.id, error: err }, 'Provider failed');
      results.push({ id: provider.id, status: 'error', error: err });
    }
  }

  const passed = results.filter(r => r.status === 'pass').length;
  const failed = results.filter(r => r.status === 'fail').length;
  const errored = results.filter(r => r.status === 'error').length;

  logger.info({ total: results.length, passed, failed, errored }, 'Data availability summary');

  return {
    results,
    passed,
    failed,
    errored,
    exitCode: failed + errored > 0 ? 1 : 0
  };
}

export function formatResult(result: CheckResult): string {
  switch (result.status) {
    case 'pass':
      return `✓ ${result.id}: ${String(result.rowCount)} ${result.rowCount === 1 ? 'row' : 'rows'}`;
    case 'fail':
      return `✗ ${result.id}: ${result.reason}`;
    case 'error':
      return `✗ ${result.id}: error: ${result.error.message}`;
  }
}
