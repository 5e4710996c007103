/**
 * Exit codes understood by PRTG EXE/Script Advanced sensors.
 */
export const EXIT_OK = 0;
export const EXIT_SYSTEM_ERROR = 2;
export const EXIT_PROTOCOL_ERROR = 3;

type ErrorDetails = {
  cause?: unknown;
  status?: number;
};

export class ConnectorError extends Error {
  readonly exitCode: number = EXIT_SYSTEM_ERROR;
  readonly status?: number;

  constructor(message: string, details: ErrorDetails = {}) {
    super(message, details.cause !== undefined ? { cause: details.cause } : undefined);
    this.name = new.target.name;
    this.status = details.status;
  }
}

/** Invalid or incomplete invocation parameters. */
export class ConfigError extends ConnectorError {}

/** The array rejected the credential or the session could not be opened. */
export class AuthFailure extends ConnectorError {
  override readonly exitCode = EXIT_PROTOCOL_ERROR;
}

/** An array query failed: network, HTTP status, or a body of the wrong shape. */
export class ArrayQueryFailure extends ConnectorError {
  override readonly exitCode = EXIT_PROTOCOL_ERROR;
}

/** The sensor state file is unreadable, corrupt, or cannot be written. */
export class StoreUnavailable extends ConnectorError {}

export type ProvisioningOperation = 'clone' | 'configure' | 'enable' | 'delete';

/**
 * A single call against the monitoring configuration API failed.
 * Never fatal for a reconciliation run.
 */
export class ProvisioningError extends ConnectorError {
  readonly operation: ProvisioningOperation;
  readonly instanceId?: string;

  constructor(
    operation: ProvisioningOperation,
    message: string,
    details: ErrorDetails & { instanceId?: string } = {}
  ) {
    super(message, details);
    this.operation = operation;
    this.instanceId = details.instanceId;
  }
}

export const errorMessage = (err: unknown): string =>
  typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string'
    ? err.message
    : String(err);
