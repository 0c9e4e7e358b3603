import type { TabularResult } from './tabularResult.js';

export type Producer = () => TabularResult | Promise<TabularResult>;

export type Outcome =
  | { readonly status: 'pass'; readonly rowCount: number }
  | { readonly status: 'fail'; readonly reason: 'empty result' };

/**
 * Invoke a producer and report whether it returned any rows.
 *
 * Errors thrown or rejected by the producer propagate unchanged. They mean
 * the provider is unavailable, which is not the same as an empty result.
 */
export async function checkNonEmpty(producer: Producer): Promise<Outcome> {
  const result = await producer();
  const rowCount = result.rowCount();

  if (rowCount > 0) {
    return { status: 'pass', rowCount };
  }

  return { status: 'fail', reason: 'empty result' };
}
