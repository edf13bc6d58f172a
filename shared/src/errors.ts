// Error taxonomy shared by the engine and the broker adapter

export class DataInsufficiencyError extends Error {
  constructor(public readonly symbol: string, message: string) {
    super(message);
    this.name = 'DataInsufficiencyError';
  }
}

export type BrokerErrorKind = 'transient' | 'rejected' | 'auth' | 'unknown';

export class BrokerError extends Error {
  readonly kind: BrokerErrorKind;
  readonly status?: number;
  readonly code?: number | string;

  constructor(message: string, kind: BrokerErrorKind, options: { status?: number; code?: number | string } = {}) {
    super(message);
    this.name = 'BrokerError';
    this.kind = kind;
    this.status = options.status;
    this.code = options.code;
  }

  get isTransient(): boolean {
    return this.kind === 'transient';
  }
}

export class ConfigurationError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
