/**
 * Tool call outcomes.
 */

import { classifyError, isAirtableError, isRetryableError, type ErrorKind } from '../errors/index.js';

export type ToolErrorKind = ErrorKind;

export interface ToolError {
  kind: ToolErrorKind;
  /** Error class name, e.g. `NotFoundError` */
  name: string;
  /** `<context>: <name> - <detail>` */
  message: string;
  /** The underlying error message */
  detail: string;
  retryable: boolean;
  statusCode?: number;
}

export type ToolResult<T> = { ok: true; value: T } | { ok: false; error: ToolError };

export function success<T>(value: T): ToolResult<T> {
  return { ok: true, value };
}

export function failure<T>(error: ToolError): ToolResult<T> {
  return { ok: false, error };
}

/**
 * Describes a thrown value as a {@link ToolError}.
 *
 * @param context - What was being attempted, e.g. `Error deleting record 'rec1' from 'Tasks' in 'app1'`
 */
export function toToolError(context: string, error: unknown): ToolError {
  const name = error instanceof Error ? error.name : 'Error';
  const detail = error instanceof Error ? error.message : String(error);

  const toolError: ToolError = {
    kind: classifyError(error),
    name,
    message: `${context}: ${name} - ${detail}`,
    detail,
    retryable: isRetryableError(error),
  };
  if (isAirtableError(error) && error.statusCode !== undefined) {
    toolError.statusCode = error.statusCode;
  }
  return toolError;
}
