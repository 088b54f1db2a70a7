/**
 * Invalid caller input on a configuration or subscription call:
 * a non-positive interval, an empty symbol, a live manager without a feed.
 */
export class ConfigurationError extends Error {
  public readonly code = "CONFIGURATION_ERROR";

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** The quote store could not be opened, migrated or written. */
export class StorageError extends Error {
  public readonly code = "STORAGE_ERROR";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
