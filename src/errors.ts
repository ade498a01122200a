/**
 * Error types surfaced by CLI commands
 */

export enum ExitCode {
  SUCCESS = 0,
  FAILURE = 1,
  CANCELLED = 2
}

/**
 * Base class for failures the CLI reports as a one-line message
 */
export class CliError extends Error {
  readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode = ExitCode.FAILURE) {
    super(message);
    this.name = 'CliError';
    this.exitCode = exitCode;
  }
}

/**
 * Invalid or conflicting command arguments
 */
export class UsageError extends CliError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export class InvalidNetuidError extends UsageError {
  readonly value: string;

  constructor(value: string) {
    super(`Invalid netuid "${value}": expected an integer between 0 and 65535`);
    this.name = 'InvalidNetuidError';
    this.value = value;
  }
}

/**
 * Missing, unreadable or mismatched wallet keys
 */
export class WalletError extends CliError {
  constructor(message: string) {
    super(message);
    this.name = 'WalletError';
  }
}

export class InsufficientBalanceError extends CliError {
  readonly required: bigint;
  readonly available: bigint;

  constructor(message: string, required: bigint, available: bigint) {
    super(message);
    this.name = 'InsufficientBalanceError';
    this.required = required;
    this.available = available;
  }
}

/**
 * Extrinsic rejected or failed on chain
 */
export class ChainError extends CliError {
  readonly section?: string;
  readonly method?: string;

  constructor(message: string, section?: string, method?: string) {
    super(message);
    this.name = 'ChainError';
    this.section = section;
    this.method = method;
  }
}

/**
 * The endpoint could not be reached; worth retrying
 */
export class ConnectionError extends ChainError {
  readonly endpoint: string;

  constructor(message: string, endpoint: string) {
    super(message);
    this.name = 'ConnectionError';
    this.endpoint = endpoint;
  }
}
