/**
 * Raised before any pipeline stage runs when the input document is missing or cannot be read.
 * This is the only error `InvoicePipeline.extract` lets through.
 */
export class DocumentNotFoundError extends Error {
  readonly code = "document_not_found";

  constructor(readonly path: string) {
    super(`Document not found: ${path}`);
    this.name = "DocumentNotFoundError";
  }
}

export class SerializationError extends Error {
  constructor(readonly path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = "SerializationError";
  }
}

/**
 * Safely extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
