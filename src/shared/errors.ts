/**
 * Error types for the redactor.
 * Each kind maps to a recovery policy in the batch driver.
 */

export class CpfRedactorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CpfRedactorError';
  }
}

export class UnreadableDocumentError extends CpfRedactorError {
  constructor(message: string, public readonly fileName?: string) {
    super(message);
    this.name = 'UnreadableDocumentError';
  }
}

export class GeometryLookupError extends CpfRedactorError {
  constructor(message: string, public readonly offset: number) {
    super(message);
    this.name = 'GeometryLookupError';
  }
}

export class ContentStreamError extends CpfRedactorError {
  constructor(message: string, public readonly pageNumber?: number) {
    super(message);
    this.name = 'ContentStreamError';
  }
}

export class WriteFailureError extends CpfRedactorError {
  constructor(message: string, public readonly outputPath: string) {
    super(message);
    this.name = 'WriteFailureError';
  }
}

export class InputDirectoryMissingError extends CpfRedactorError {
  constructor(public readonly inputDir: string) {
    super(`Input directory not found: ${inputDir}`);
    this.name = 'InputDirectoryMissingError';
  }
}

export class InvalidOptionError extends CpfRedactorError {
  constructor(public readonly option: string, message: string) {
    super(`Invalid ${option}: ${message}`);
    this.name = 'InvalidOptionError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
