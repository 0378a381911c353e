/**
 * ExtractionError
 *
 * Base error class for failures while reading or extracting a document.
 */
export class ExtractionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ExtractionError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create ExtractionError from unknown error with context
   */
  static fromError(context: string, error: unknown): ExtractionError {
    return new ExtractionError(
      `${context}: ${ExtractionError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * PdfToolError
 *
 * A command-line tool (pdfinfo, pdftotext, magick, tesseract...) exited
 * with a non-zero status.
 */
export class PdfToolError extends ExtractionError {
  readonly tool: string;
  readonly exitCode: number;

  constructor(tool: string, exitCode: number, stderr: string) {
    super(
      `${tool} failed (exit ${exitCode}): ${stderr.trim() || 'Unknown error'}`,
    );
    this.name = 'PdfToolError';
    this.tool = tool;
    this.exitCode = exitCode;
  }
}

/**
 * PageFailureThresholdError
 *
 * Too many page units failed for the extraction result to be useful.
 */
export class PageFailureThresholdError extends ExtractionError {
  readonly failedCount: number;
  readonly totalCount: number;

  constructor(failedCount: number, totalCount: number, maxRatio: number) {
    super(
      `${failedCount} of ${totalCount} pages failed ` +
        `(allowed ratio ${maxRatio})`,
    );
    this.name = 'PageFailureThresholdError';
    this.failedCount = failedCount;
    this.totalCount = totalCount;
  }
}
