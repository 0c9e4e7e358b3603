/**
 * A data provider could not deliver a table: unreachable endpoint, non-2xx
 * response, unreadable file or a payload of the wrong shape.
 */
export class ProviderError extends Error {
  public readonly providerId: string;

  constructor(providerId: string, message: string, options?: ErrorOptions) {
    super(`${providerId}: ${message}`, options);
    this.name = 'ProviderError';
    this.providerId = providerId;
  }
}

export class TableParseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TableParseError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}
