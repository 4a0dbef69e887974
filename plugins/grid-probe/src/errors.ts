/**
 * Error types raised by grid-probe.
 *
 * Every error carries a stable `code` so the CLI and tests can tell them
 * apart without matching on message text.
 */

export class ProbeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export class UnsupportedBrowserError extends ProbeError {
  constructor(
    public readonly browser: string,
    supported: readonly string[],
  ) {
    super(
      `Unsupported browser: ${browser}. Use ${supported.map((b) => `'${b}'`).join(', ')}`,
      'UNSUPPORTED_BROWSER',
    );
  }
}

export class ConnectionError extends ProbeError {
  constructor(message: string, cause: unknown) {
    super(message, 'CONNECTION_FAILED', { cause });
  }
}

export class NotConnectedError extends ProbeError {
  constructor() {
    super('WebDriver not connected. Call connect() first.', 'NOT_CONNECTED');
  }
}

export class ConfigurationError extends ProbeError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIG_ERROR');
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
