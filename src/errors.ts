export class PdfToMarkdownError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PdfToMarkdownError";
  }
}

/** Missing credential or unusable configuration. Must be fixed outside the process. */
export class ConfigurationError extends PdfToMarkdownError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class SubmissionError extends PdfToMarkdownError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SubmissionError";
  }
}

export class InputNotFoundError extends SubmissionError {
  constructor(public readonly filePath: string) {
    super(`File not found: ${filePath}`);
    this.name = "InputNotFoundError";
  }
}

export class RemoteError extends SubmissionError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RemoteError";
  }
}

export class ExpiredSignedUrlError extends RemoteError {
  constructor(
    public readonly expirySeconds: number,
    public readonly elapsedMs: number,
    options?: { cause?: unknown },
  ) {
    super(
      `Signed URL expired before OCR processing completed (window ${expirySeconds}s, elapsed ${(elapsedMs / 1000).toFixed(2)}s)`,
      undefined,
      options,
    );
    this.name = "ExpiredSignedUrlError";
  }
}

export class AssemblerContractViolation extends PdfToMarkdownError {
  constructor(
    public readonly pageIndex: number,
    public readonly imageId: string,
  ) {
    super(`Page ${pageIndex} references image "${imageId}" which is not in its image list`);
    this.name = "AssemblerContractViolation";
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
