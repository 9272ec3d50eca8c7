// ============================================================================
// src/shared/errors/base.error.ts
// ============================================================================

export interface MasterMatchErrorOptions {
  readonly code: string;
  readonly message: string;
  readonly cause?: unknown;
  readonly metadata?: Record<string, unknown>;
  readonly exposeMessage?: boolean;
}

export class MasterMatchError extends Error {
  public readonly code: string;

  public readonly metadata: Record<string, unknown>;

  public readonly exposeMessage: boolean;

  public constructor(options: MasterMatchErrorOptions) {
    super(options.message);
    this.name = 'MasterMatchError';
    this.code = options.code;
    this.metadata = options.metadata ?? {};
    this.exposeMessage = options.exposeMessage ?? false;

    if (options.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace?.(this, MasterMatchError);
  }
}

export const isMasterMatchError = (value: unknown): value is MasterMatchError =>
  value instanceof MasterMatchError;
