/**
 * Error context carried alongside an {@link InkscaleError}.
 */
export interface ErrorContext {
  /** Book (source file name) the failure belongs to */
  book?: string;
  /** Operation that was being performed */
  operation?: string;
  /** Original cause of the error */
  cause?: Error;
  timestamp?: Date;
}

/**
 * Base error class. Every failure the pipeline raises on purpose extends it,
 * so callers can branch on `code` without string matching.
 */
export class InkscaleError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;
  public readonly book?: string;
  public readonly operation?: string;
  public readonly timestamp: Date;
  public readonly cause?: Error;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    context?: ErrorContext
  ) {
    super(message);
    this.name = "InkscaleError";
    this.code = code;
    this.details = details;
    this.book = context?.book;
    this.operation = context?.operation;
    this.timestamp = context?.timestamp ?? new Date();
    this.cause = context?.cause;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      book: this.book,
      operation: this.operation,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };
  }
}

/**
 * Malformed or missing settings. Fatal at startup.
 */
export class ConfigurationError extends InkscaleError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONFIGURATION_ERROR", details);
    this.name = "ConfigurationError";
  }
}

/**
 * Source container unreadable. Aborts that book only.
 */
export class ExtractionError extends InkscaleError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    context?: ErrorContext,
    code = "EXTRACTION_ERROR"
  ) {
    super(message, code, details, context);
    this.name = "ExtractionError";
  }
}

/**
 * The source yielded zero usable images.
 */
export class NoContentError extends ExtractionError {
  constructor(book: string, details?: Record<string, unknown>) {
    super(`No usable images found in ${book}`, details, { book }, "NO_CONTENT");
    this.name = "NoContentError";
  }
}

/**
 * Failures of the external upscaler that are not tied to one batch.
 * Per-batch non-zero exits are reported as failed `BatchResult`s instead.
 */
export class ExternalToolError extends InkscaleError {
  public readonly batchIndex?: number;

  constructor(
    message: string,
    options: {
      batchIndex?: number;
      code?: string;
      details?: Record<string, unknown>;
    } = {}
  ) {
    super(message, options.code ?? "EXTERNAL_TOOL_ERROR", {
      batchIndex: options.batchIndex,
      ...options.details,
    });
    this.name = "ExternalToolError";
    this.batchIndex = options.batchIndex;
  }
}

/**
 * The upscaler binary is missing or not executable. Checked once before
 * any batch is launched.
 */
export class UpscalerNotFoundError extends ExternalToolError {
  public readonly binary: string;

  constructor(binary: string, reason: string) {
    super(`Upscaler not found: ${binary} (${reason})`, {
      code: "UPSCALER_NOT_FOUND",
      details: { binary, reason },
    });
    this.name = "UpscalerNotFoundError";
    this.binary = binary;
  }
}

/**
 * Writing the output container failed. Aborts that book's output only.
 */
export class AssemblyError extends InkscaleError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    context?: ErrorContext
  ) {
    super(message, "ASSEMBLY_ERROR", details, context);
    this.name = "AssemblyError";
  }
}

export class FileOperationError extends InkscaleError {
  public readonly path?: string;

  constructor(message: string, path?: string, details?: Record<string, unknown>) {
    super(message, "FILE_OPERATION_ERROR", { path, ...details });
    this.name = "FileOperationError";
    this.path = path;
  }
}

/**
 * Wrap an unknown thrown value into an InkscaleError subclass.
 */
export function wrapError(
  error: unknown,
  ErrorClass: new (
    message: string,
    details?: Record<string, unknown>,
    context?: ErrorContext
  ) => InkscaleError,
  context?: Omit<ErrorContext, "cause">
): InkscaleError {
  if (error instanceof InkscaleError) {
    return error;
  }

  const originalError = error instanceof Error ? error : new Error(String(error));
  return new ErrorClass(
    originalError.message,
    { originalError: originalError.name },
    { ...context, cause: originalError }
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
