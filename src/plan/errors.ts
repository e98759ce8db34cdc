import type { PartialArtifacts, StageName } from '@/plan/types.ts';

export type CapabilityName = 'vision' | 'search' | 'scrape' | 'account' | 'reasoner';

export type ErrorKind = 'InputError' | 'ExternalServiceError' | 'ValidationError' | 'CancellationError';

export abstract class TradePlanError extends Error {
  abstract readonly kind: ErrorKind;
}

export class InputError extends TradePlanError {
  readonly kind = 'InputError';
  readonly issues: readonly string[];

  constructor(issues: string | readonly string[]) {
    const list = typeof issues === 'string' ? [issues] : issues;
    super(list.join('; '));
    this.name = 'InputError';
    this.issues = list;
  }
}

export type ExternalServiceErrorOptions = {
  status?: number | null;
  retryable?: boolean;
  stage?: StageName | null;
  attempts?: number;
  cause?: unknown;
};

export class ExternalServiceError extends TradePlanError {
  readonly kind = 'ExternalServiceError';
  readonly capability: CapabilityName;
  readonly status: number | null;
  readonly retryable: boolean;
  readonly stage: StageName | null;
  readonly attempts: number;

  constructor(capability: CapabilityName, message: string, options: ExternalServiceErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'ExternalServiceError';
    this.capability = capability;
    this.status = options.status ?? null;
    this.retryable = options.retryable ?? true;
    this.stage = options.stage ?? null;
    this.attempts = options.attempts ?? 1;
  }

  /** Copy of this error attributed to the stage that gave up on it. */
  tagged = (stage: StageName, attempts: number): ExternalServiceError =>
    new ExternalServiceError(this.capability, this.message, {
      status: this.status,
      retryable: this.retryable,
      stage,
      attempts,
      cause: this.cause,
    });
}

/** HTTP statuses worth another attempt; every other 4xx means the request itself is wrong. */
export const isRetryableStatus = (status: number): boolean =>
  status === 408 || status === 429 || status >= 500;

export class ValidationError extends TradePlanError {
  readonly kind = 'ValidationError';
  readonly issues: readonly string[];
  readonly artifact: unknown;

  constructor(issues: string | readonly string[], artifact: unknown = null) {
    const list = typeof issues === 'string' ? [issues] : issues;
    super(list.join('; '));
    this.name = 'ValidationError';
    this.issues = list;
    this.artifact = artifact;
  }
}

export class CancellationError extends TradePlanError {
  readonly kind = 'CancellationError';

  constructor(message = 'Run cancelled', options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = 'CancellationError';
  }
}

export class PipelineError extends Error {
  readonly stage: StageName;
  readonly kind: ErrorKind;
  readonly error: TradePlanError;
  readonly partial: Readonly<PartialArtifacts>;

  constructor(stage: StageName, error: TradePlanError, partial: PartialArtifacts = {}) {
    super(`${stage} stage failed (${error.kind}): ${error.message}`, { cause: error });
    this.name = 'PipelineError';
    this.stage = stage;
    this.kind = error.kind;
    this.error = error;
    this.partial = Object.freeze({ ...partial });
  }

  get issues(): readonly string[] {
    const { error } = this;
    if (error instanceof InputError || error instanceof ValidationError) return error.issues;
    return [error.message];
  }
}

export const isTradePlanError = (err: unknown): err is TradePlanError =>
  err instanceof TradePlanError;
