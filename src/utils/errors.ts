/**
 * Base class for every expected failure of the generator. Anything that is not
 * a `CvGeneratorError` is treated as an unexpected crash by the CLI.
 */
export class CvGeneratorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends CvGeneratorError {}

export class JsonFileNotFoundError extends CvGeneratorError {}

export class JsonParsingError extends CvGeneratorError {}

export class DataValidationError extends CvGeneratorError {
  readonly validationErrors: string[];

  constructor(message: string, validationErrors: string[] = []) {
    super(message);
    this.validationErrors = validationErrors;
  }
}

export class OutputPathError extends CvGeneratorError {}

export class PdfRenderError extends CvGeneratorError {
  readonly outputPath: string | null;

  constructor(message: string, options?: { cause?: unknown; outputPath?: string | null }) {
    super(message, { cause: options?.cause });
    this.outputPath = options?.outputPath ?? null;
  }
}

export function isCvGeneratorError(error: unknown): error is CvGeneratorError {
  return error instanceof CvGeneratorError;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message.trim()) return error.message.trim();
  if (typeof error === 'string' && error.trim()) return error.trim();
  return 'Something went wrong.';
}
