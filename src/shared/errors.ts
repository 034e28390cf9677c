/**
 * Storybook pipeline error types
 *
 * Fatal errors unwind to the caller of StoryCreator.createBook(). Recoverable
 * ones are caught where they happen and reported to the pipeline observer.
 */

export type PipelineErrorCode =
  | 'CONFIG_INVALID'
  | 'CREDENTIAL_MISSING'
  | 'TEXT_GENERATION_FAILED'
  | 'IMAGE_GENERATION_FAILED'
  | 'PERSISTENCE_FAILED';

export interface ConfigIssue {
  path: string;
  message: string;
}

export abstract class StoryPipelineError extends Error {
  public abstract readonly code: PipelineErrorCode;
  public abstract readonly fatal: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigValidationError extends StoryPipelineError {
  public readonly code = 'CONFIG_INVALID';
  public readonly fatal = true;
  public readonly issues: ConfigIssue[];

  constructor(message: string, issues: ConfigIssue[] = [], options?: { cause?: unknown }) {
    const detail = issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ');
    super(detail ? `${message} (${detail})` : message, options);
    this.issues = issues;
  }
}

export class CredentialMissingError extends StoryPipelineError {
  public readonly code = 'CREDENTIAL_MISSING';
  public readonly fatal = true;
  public readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing required credential(s): ${missing.join(', ')}`);
    this.missing = missing;
  }
}

export class TextGenerationError extends StoryPipelineError {
  public readonly code = 'TEXT_GENERATION_FAILED';
  public readonly fatal = true;
  public readonly provider: string;

  constructor(params: { provider: string; message: string; cause?: unknown }) {
    super(params.message, { cause: params.cause });
    this.provider = params.provider;
  }
}

export class ImageGenerationError extends StoryPipelineError {
  public readonly code = 'IMAGE_GENERATION_FAILED';
  public readonly fatal = false;
  public readonly provider: string;
  public readonly mode: 'generate' | 'edit';
  public readonly pageNumber?: number;

  constructor(params: {
    provider: string;
    mode: 'generate' | 'edit';
    message: string;
    pageNumber?: number;
    cause?: unknown;
  }) {
    super(params.message, { cause: params.cause });
    this.provider = params.provider;
    this.mode = params.mode;
    if (params.pageNumber !== undefined) this.pageNumber = params.pageNumber;
  }
}

export class PersistenceError extends StoryPipelineError {
  public readonly code = 'PERSISTENCE_FAILED';
  public readonly fatal = false;
  public readonly target: string;

  constructor(params: { target: string; message: string; cause?: unknown }) {
    super(params.message, { cause: params.cause });
    this.target = params.target;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * One-line cause for the command line. Pipeline errors carry their code.
 */
export function describeError(error: unknown): string {
  if (error instanceof StoryPipelineError) {
    return `[${error.code}] ${error.message}`;
  }
  return errorMessage(error);
}
