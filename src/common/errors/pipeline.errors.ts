export type PipelineStageName = 'extract' | 'land' | 'cleanse' | 'model' | 'publish';

/**
 * Base class for every failure the pipeline knows how to describe.
 * `fatal` errors abort the run; the others are recovered where they are raised.
 */
export abstract class PipelineError extends Error {
  abstract readonly fatal: boolean;

  constructor(
    readonly stage: PipelineStageName,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Network or status failure for one page, after retries were exhausted
 * (or immediately for a non-transient status).
 */
export class FetchError extends PipelineError {
  readonly fatal = true;

  constructor(
    message: string,
    readonly page: number | null,
    readonly attempts: number,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super('extract', message, options);
  }
}

/** A record failed a mandatory-field check; it is dropped and counted. */
export class ValidationError extends PipelineError {
  readonly fatal = false;

  constructor(
    readonly reason: ValidationReason,
    readonly record: { page: number; position: number; id: string | null },
  ) {
    super(
      'cleanse',
      `Record ${record.id ?? '<no id>'} (page ${record.page}, position ${record.position}) dropped: ${reason}`,
    );
  }
}

export type ValidationReason = 'missing_id' | 'missing_name';

/** Destination unwritable; nothing partial is left visible. */
export class WriteError extends PipelineError {
  readonly fatal = true;

  constructor(
    stage: PipelineStageName,
    readonly target: string,
    options?: { cause?: unknown },
  ) {
    super(stage, `Failed to write ${target}: ${describeCause(options?.cause)}`, options);
  }
}

/** A logic failure while transforming persisted, deterministic input. */
export class TransformError extends PipelineError {
  readonly fatal = true;
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return cause === undefined ? 'unknown error' : String(cause);
}
