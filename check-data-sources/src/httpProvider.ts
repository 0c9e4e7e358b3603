import { DataProvider, type SourceFormat } from './dataProvider.js';
import { ProviderError } from './errors.js';
import { logger } from './logger.js';
import type { Table } from './tabularResult.js';

/**
 * Provider backed by an HTTP endpoint returning JSON records or CSV.
 */
export class HttpTableProvider extends DataProvider {
  public readonly kind = 'http' as const;

  public async fetchTable(): Promise<Table> {
    logger.debug({ provider: this.id, url: this.location }, 'Fetching table over HTTP');

    const { response, text } = await this.fetchTextWithTimeout(this.location, {
      headers: {
        Accept: 'application/json, text/csv;q=0.9'
      }
    }).catch((error: unknown) => {
      if (error instanceof ProviderError) {
        throw error;
      }
      throw new ProviderError(
        this.id,
        `request to ${this.location} failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    });

    if (!response.ok) {
      throw new ProviderError(
        this.id,
        `request to ${this.location} returned HTTP ${String(response.status)}`
      );
    }

    const table = this.parsePayload(text, this.format ?? formatFromContentType(response.headers.get('content-type')));

    logger.debug({ provider: this.id, rows: table.rowCount() }, 'Fetched table over HTTP');
    return table;
  }
}

function formatFromContentType(contentType: string | null): SourceFormat {
  return contentType?.toLowerCase().includes('text/csv') ? 'csv' : 'json';
}
