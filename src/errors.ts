/**
 * Error hierarchy for seqrecon.
 *
 * Fatal errors (descriptor and configuration problems) are thrown before any data is
 * processed. Everything else is collected into reports; see `validation/types.ts` and
 * `reconcile/types.ts` for the non-fatal issue kinds.
 */

export interface ErrorOptions {
  cause?: Error;
  suggestion?: string | null;
}

export class SeqReconError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown>;
  override readonly cause?: Error;
  readonly timestamp: string;
  readonly suggestion: string | null;

  constructor(
    code: string,
    message: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'SeqReconError';
    this.code = code;
    this.details = details ?? {};
    this.cause = options?.cause;
    this.timestamp = new Date().toISOString();
    this.suggestion = options?.suggestion ?? null;
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    const obj: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    };
    if (Object.keys(this.details).length > 0) {
      obj.details = this.details;
    }
    if (this.cause !== undefined) {
      obj.cause = String(this.cause);
    }
    obj.timestamp = this.timestamp;
    if (this.suggestion !== null) {
      obj.suggestion = this.suggestion;
    }
    return obj;
  }
}

export class ConfigNotFoundError extends SeqReconError {
  constructor(configPath: string, options?: ErrorOptions) {
    super('CONFIG_NOT_FOUND', `Configuration file not found: ${configPath}`, { configPath }, options);
    this.name = 'ConfigNotFoundError';
  }
}

export class ConfigError extends SeqReconError {
  constructor(message: string, options?: ErrorOptions) {
    super('CONFIG_INVALID', message, {}, options);
    this.name = 'ConfigError';
  }
}

/**
 * A schema descriptor is malformed. Always fatal.
 */
export class SchemaError extends SeqReconError {
  constructor(message: string, source?: string | null, options?: ErrorOptions) {
    super('SCHEMA_INVALID', message, source ? { source } : {}, options);
    this.name = 'SchemaError';
  }

  get source(): string | null {
    const source = this.details['source'];
    return typeof source === 'string' ? source : null;
  }
}

export class TargetDescriptorError extends SeqReconError {
  constructor(message: string, source?: string | null, options?: ErrorOptions) {
    super('TARGET_DESCRIPTOR_INVALID', message, source ? { source } : {}, options);
    this.name = 'TargetDescriptorError';
  }
}

/**
 * One input file cannot be used. The run continues without that file's contribution.
 */
export class SourceUnreadableError extends SeqReconError {
  constructor(path: string, reason: string, options?: ErrorOptions) {
    super('SOURCE_UNREADABLE', `Cannot read source ${path}: ${reason}`, { path, reason }, options);
    this.name = 'SourceUnreadableError';
  }

  get path(): string {
    return String(this.details['path']);
  }

  get reason(): string {
    return String(this.details['reason']);
  }
}

/**
 * The destination of an aggregation cannot be written.
 */
export class AggregationError extends SeqReconError {
  constructor(destination: string, reason: string, options?: ErrorOptions) {
    super('AGGREGATION_FAILED', `Cannot write ${destination}: ${reason}`, { destination, reason }, options);
    this.name = 'AggregationError';
  }

  get destination(): string {
    return String(this.details['destination']);
  }
}

export const ErrorCodes = Object.freeze({
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_INVALID: 'CONFIG_INVALID',
  SCHEMA_INVALID: 'SCHEMA_INVALID',
  TARGET_DESCRIPTOR_INVALID: 'TARGET_DESCRIPTOR_INVALID',
  SOURCE_UNREADABLE: 'SOURCE_UNREADABLE',
  AGGREGATION_FAILED: 'AGGREGATION_FAILED',
} as const);

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
