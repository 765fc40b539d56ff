import type { ErrorResponse, ErrorType } from '../types/index.js';

/**
 * Base class for errors raised by the engine
 */
export class RtfComposerError extends Error {
  readonly type: ErrorType;
  readonly context?: Record<string, unknown>;
  readonly suggestions?: string[];

  constructor(
    type: ErrorType,
    message: string,
    context?: Record<string, unknown>,
    suggestions?: string[]
  ) {
    super(message);
    this.name = new.target.name;
    this.type = type;
    this.context = context;
    this.suggestions = suggestions;
  }
}

/**
 * Malformed length literal or inline control word
 */
export class ParseError extends RtfComposerError {
  constructor(message: string, context?: Record<string, unknown>, suggestions?: string[]) {
    super('PARSE_ERROR', message, context, suggestions);
  }
}

/**
 * Unknown layout preset, broken style reference, or a write into a frozen template
 */
export class ConfigError extends RtfComposerError {
  constructor(message: string, context?: Record<string, unknown>, suggestions?: string[]) {
    super('CONFIG_ERROR', message, context, suggestions);
  }
}

/**
 * Check if a value is an error response
 */
export function isErrorResponse(value: unknown): value is ErrorResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'error' in value &&
    'message' in value &&
    typeof value.error === 'string' &&
    typeof value.message === 'string'
  );
}

/**
 * Convert any thrown value into an ErrorResponse
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof RtfComposerError) {
    const response: ErrorResponse = {
      error: error.type,
      message: error.message,
    };
    if (error.context) response.context = error.context;
    if (error.suggestions) response.suggestions = error.suggestions;
    return response;
  }

  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    if (code) {
      return {
        error: 'IO_ERROR',
        message: error.message,
        context: { code },
      };
    }
    return { error: 'PROCESSING_ERROR', message: error.message };
  }

  return { error: 'PROCESSING_ERROR', message: String(error) };
}
