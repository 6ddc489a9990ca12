export class EngineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Plex unreachable or unauthorized. The next tick retries. */
export class FetchError extends EngineError {
  readonly unauthorized: boolean;
  readonly status?: number;

  constructor(
    message: string,
    options: { cause?: unknown; status?: number; unauthorized?: boolean } = {}
  ) {
    super(message, { cause: options.cause });
    this.status = options.status;
    this.unauthorized = options.unauthorized ?? false;
  }
}

/** Notification socket failed or closed. We fall back to polling. */
export class PushChannelError extends EngineError {}

/** Discord not reachable after retries, or still in cooldown. */
export class PresenceConnectError extends EngineError {}

/** Discord rejected an update even after a forced reconnect. */
export class PresencePublishError extends EngineError {}

export class ConfigError extends EngineError {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.missing = missing;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
