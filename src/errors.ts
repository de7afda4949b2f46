/**
 * Structured Errors — Agent-friendly error helpers
 *
 * Fatal failures carry a machine-readable code, a human-readable message,
 * and a recovery hint. The same shape is returned by MCP tools.
 */

export interface StructuredError {
  error: string;
  message: string;
  hint: string;
  status?: number;
  details?: unknown;
}

export type MergeErrorCode = 'decode_error' | 'invalid_document' | 'config_error' | 'validation_error';

export class MergeError extends Error {
  constructor(
    public code: MergeErrorCode,
    message: string,
    public hint: string,
    public details?: unknown,
  ) {
    super(message);
    this.name = 'MergeError';
  }
}

export class RetrievalError extends Error {
  constructor(
    message: string,
    public url: string,
    public statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'RetrievalError';
  }
}

export function decodeError(source: string, cause: unknown): MergeError {
  return new MergeError(
    'decode_error',
    `Document from source '${source}' could not be decoded: ${describeError(cause)}`,
    `Check that '${source}' serves a JSON or YAML OpenAPI document.`,
    { source },
  );
}

export function invalidDocumentError(reason: string): MergeError {
  return new MergeError(
    'invalid_document',
    reason,
    'Pass a JSON object at the top level of the document.',
  );
}

export function validationError(details: unknown): MergeError {
  return new MergeError(
    'validation_error',
    'Request failed validation.',
    'Check the details array for specific field errors and correct the request.',
    details,
  );
}

export function configError(message: string, details?: unknown): MergeError {
  return new MergeError(
    'config_error',
    message,
    'Check the details array for the offending fields and correct the configuration file.',
    details,
  );
}

export function toStructuredError(err: unknown): StructuredError {
  if (err instanceof MergeError) {
    const body: StructuredError = { error: err.code, message: err.message, hint: err.hint };
    if (err.details !== undefined) body.details = err.details;
    return body;
  }
  if (err instanceof RetrievalError) {
    const body: StructuredError = {
      error: 'retrieval_error',
      message: err.message,
      hint: `Check that ${err.url} is reachable and serves an OpenAPI document.`,
    };
    if (err.statusCode !== undefined) body.status = err.statusCode;
    return body;
  }
  return {
    error: 'internal_error',
    message: describeError(err),
    hint: 'Retry the request. If the error persists, check service logs.',
  };
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
