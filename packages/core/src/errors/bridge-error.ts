/**
 * Error types shared by schema generation, record mapping and lookups
 */

export type BridgeErrorCode =
  | 'TYPE_MISMATCH'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'READ_FAILED'
  | 'UNKNOWN';

export interface BridgeErrorDetails {
  /** Error code for programmatic handling */
  code: BridgeErrorCode;
  /** Human-readable message */
  message: string;
  /** Record source that raised the error */
  sourceId?: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class BridgeError extends Error {
  readonly code: BridgeErrorCode;
  readonly sourceId?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: BridgeErrorDetails) {
    super(details.message);
    this.name = 'BridgeError';
    this.code = details.code;
    this.sourceId = details.sourceId;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    Error.captureStackTrace(this, BridgeError);
  }

  /**
   * Format error as a structured, actionable message
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.sourceId) {
      parts.push(`Source: ${this.sourceId}`);
    }

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  /**
   * Convert to JSON for structured error responses
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      sourceId: this.sourceId,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Helper to wrap unknown errors as BridgeError
 */
export function wrapError(
  error: unknown,
  sourceId?: string,
  defaultCode: BridgeErrorCode = 'UNKNOWN'
): BridgeError {
  if (error instanceof BridgeError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new BridgeError({
    code: defaultCode,
    message,
    sourceId,
    cause,
  });
}
