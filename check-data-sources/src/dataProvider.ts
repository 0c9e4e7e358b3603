import type { Producer } from './dataAvailabilityChecker.js';
import { ProviderError } from './errors.js';
import { selectRecords, tableFromCsv, tableFromRecords } from './tableParsing.js';
import type { Table } from './tabularResult.js';

export type SourceKind = 'http' | 'file';

export type SourceFormat = 'json' | 'csv';

/**
 * Settings shared by every configured provider.
 */
export interface SourceOptions {
  readonly id: string;
  readonly name: string;
  readonly location: string;
  readonly format?: SourceFormat;
  readonly recordsPath?: string;
  readonly timeoutMs?: number;
}

/**
 * Abstract base class for data providers (points, playing, forecast, ...).
 *
 * Concrete subclasses:
 *   - HttpTableProvider (in ./httpProvider.ts)
 *   - FileTableProvider (in ./fileProvider.ts)
 *
 * A provider is a zero-argument source of a table. How it reaches its data
 * is its own business; the checker only ever sees `producer()`.
 */
export abstract class DataProvider {
  public abstract readonly kind: SourceKind;

  public readonly id: string;
  public readonly name: string;
  public readonly location: string;

  protected readonly format: SourceFormat | undefined;
  protected readonly recordsPath: string | undefined;
  protected readonly timeoutMs: number;

  constructor(options: SourceOptions) {
    this.id = options.id;
    this.name = options.name;
    this.location = options.location;
    this.format = options.format;
    this.recordsPath = options.recordsPath;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  /**
   * Fetch a fresh table. Rejects with ProviderError when the data cannot be
   * obtained or does not have a tabular shape.
   */
  public abstract fetchTable(): Promise<Table>;

  /**
   * Bind fetchTable into the zero-argument callable the checker takes.
   */
  public producer(): Producer {
    return () => this.fetchTable();
  }

  /**
   * Shared HTTP helper: fetch a URL and read its body under one hard
   * timeout. The deadline covers the body as well as the headers, and an
   * expired deadline rejects with a ProviderError saying so.
   */
  protected async fetchTextWithTimeout(
    url: string,
    init: RequestInit & { readonly timeoutMs?: number } = {}
  ): Promise<{ readonly response: Response; readonly text: string }> {
    const { timeoutMs = this.timeoutMs, ...rest } = init;
    const controller = new AbortController();
    const timedOut = (cause?: unknown): ProviderError =>
      new ProviderError(this.id, `request to ${url} timed out after ${String(timeoutMs)} ms`, { cause });

    // Rejects on abort even when the body stream ignores the signal
    const deadline = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener('abort', () => reject(timedOut()), { once: true });
    });
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await Promise.race([fetch(url, { ...rest, signal: controller.signal }), deadline]);
      const text = await Promise.race([response.text(), deadline]);
      return { response, text };
    } catch (error) {
      if (controller.signal.aborted && !(error instanceof ProviderError)) {
        throw timedOut(error);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }

  /**
   * Turn a raw payload into a table, wrapping parse failures so callers see
   * which provider produced the bad data.
   */
  protected parsePayload(text: string, format: SourceFormat): Table {
    try {
      if (format === 'csv') {
        return tableFromCsv(text);
      }
      const document: unknown = JSON.parse(text.replace(/^\uFEFF/, ''));
      return tableFromRecords(selectRecords(document, this.recordsPath));
    } catch (error) {
      throw new ProviderError(
        this.id,
        `could not parse ${format.toUpperCase()} payload: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }
}
