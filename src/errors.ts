export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Raised before any target is processed when the posting store cannot be reached. */
export class StoreUnavailableError extends Error {
  constructor(message = "Posting store is unavailable") {
    super(message);
    this.name = "StoreUnavailableError";
  }
}

/**
 * The messaging channel rejected our credentials or permissions.
 * Retrying the next message will not help, so the Notifier stops the run's sends.
 */
export class ChannelAuthError extends Error {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = "ChannelAuthError";
    this.statusCode = statusCode;
  }
}

export class ChannelDeliveryError extends Error {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = "ChannelDeliveryError";
    this.statusCode = statusCode;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
