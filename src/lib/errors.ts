export type ToolErrorCode =
  | 'validation_error'
  | 'invalid_request'
  | 'not_found'
  | 'conflict'
  | 'serialization_error'
  | 'configuration_error'
  | 'internal_error';

export type FieldError = {
  field: string;
  message: string;
  code?: string;
};

export type ToolErrorPayload = {
  error: {
    code: ToolErrorCode;
    message: string;
    fieldErrors?: FieldError[];
    details?: Record<string, unknown>;
    retryable?: boolean;
  };
};

type McpToolErrorOptions = {
  fieldErrors?: FieldError[];
  details?: Record<string, unknown>;
  retryable?: boolean;
  cause?: unknown;
};

export class McpToolError extends Error {
  readonly code: ToolErrorCode;
  readonly fieldErrors?: FieldError[];
  readonly details?: Record<string, unknown>;
  readonly retryable?: boolean;

  constructor(code: ToolErrorCode, message: string, options: McpToolErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'McpToolError';
    this.code = code;
    this.fieldErrors = options.fieldErrors;
    this.details = options.details;
    this.retryable = options.retryable;
  }

  toPayload(): ToolErrorPayload {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.fieldErrors?.length ? { fieldErrors: this.fieldErrors } : {}),
        ...(this.details ? { details: this.details } : {}),
        ...(this.retryable !== undefined ? { retryable: this.retryable } : {}),
      },
    };
  }
}

export class ValidationError extends McpToolError {
  constructor(message: string, fieldErrors: FieldError[] = []) {
    super('validation_error', message, { fieldErrors, retryable: false });
    this.name = 'ValidationError';
  }
}

export class InvalidRequestError extends McpToolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('invalid_request', message, { details });
    this.name = 'InvalidRequestError';
  }
}

export class NotFoundError extends McpToolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('not_found', message, { details });
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends McpToolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('conflict', message, { details });
    this.name = 'ConflictError';
  }
}

/**
 * A payload could not be turned into valid JSON. Never recovered from: the
 * caller gets this error instead of partial output.
 */
export class SerializationError extends McpToolError {
  constructor(message: string, options: { cause?: unknown; fieldErrors?: FieldError[] } = {}) {
    super('serialization_error', message, { ...options, retryable: false });
    this.name = 'SerializationError';
  }
}

/**
 * Wiring or manifest problem. Raised while the extension starts, before any
 * request is served.
 */
export class ConfigurationError extends McpToolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('configuration_error', message, { details, retryable: false });
    this.name = 'ConfigurationError';
  }
}

export class ResourceContractError extends McpToolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('internal_error', message, { details });
    this.name = 'ResourceContractError';
  }
}
