import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { DataProvider, type SourceFormat } from './dataProvider.js';
import { ProviderError } from './errors.js';
import { logger } from './logger.js';
import type { Table } from './tabularResult.js';

/**
 * Provider backed by a local JSON or CSV file.
 */
export class FileTableProvider extends DataProvider {
  public readonly kind = 'file' as const;

  public async fetchTable(): Promise<Table> {
    let text: string;
    try {
      text = await readFile(this.location, 'utf8');
    } catch (error) {
      throw new ProviderError(
        this.id,
        `could not read ${this.location}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    const table = this.parsePayload(text, this.format ?? formatFromExtension(this.location));
    logger.debug({ provider: this.id, path: this.location, rows: table.rowCount() }, 'Read table from file');
    return table;
  }
}

function formatFromExtension(path: string): SourceFormat {
  return extname(path).toLowerCase() === '.csv' ? 'csv' : 'json';
}
