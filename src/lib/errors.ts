export class TumorboardError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends TumorboardError {}

export class PromptInputError extends TumorboardError {}

export class GoldStandardError extends TumorboardError {}

/** Evidence service unreachable, non-2xx, or returned an unreadable body. */
export class MyVariantApiError extends TumorboardError {
  readonly status: number | null;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.status = options?.status ?? null;
  }
}

/** Raised when an assessment cannot be built, e.g. confidence outside [0, 1]. */
export class AssessmentValidationError extends TumorboardError {}

/**
 * The single error kind surfaced by the assessment generator: exhausted
 * completion retries, unparseable model output, or an uncoercible schema.
 */
export class LLMServiceError extends TumorboardError {}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
