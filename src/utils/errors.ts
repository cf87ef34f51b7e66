/**
 * Error types raised by the reconciliation engine and the Google Maps client
 */

/** Unsupported value handed to the Place constructor. */
export class InvalidInputError extends TypeError {
  readonly code = 'INVALID_PLACE_INPUT';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/** Unknown or out-of-range threshold / component filter / client setting. */
export class ConfigurationError extends Error {
  readonly code = 'INVALID_CONFIGURATION';

  constructor(message: string, readonly key?: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** A payload is missing a field the parser cannot do without. */
export class UpstreamPayloadError extends Error {
  readonly code = 'MALFORMED_PAYLOAD';

  constructor(message: string) {
    super(message);
    this.name = 'UpstreamPayloadError';
  }
}

/** Non-OK status or transport failure from the Google Maps web services. */
export class MapsApiError extends Error {
  readonly code = 'MAPS_API_ERROR';

  constructor(message: string, readonly endpoint: string, readonly status?: string) {
    super(message);
    this.name = 'MapsApiError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
