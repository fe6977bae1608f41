export {
  ConfigurationError,
  ConflictError,
  type FieldError,
  InvalidRequestError,
  McpToolError,
  NotFoundError,
  ResourceContractError,
  SerializationError,
  type ToolErrorCode,
  type ToolErrorPayload,
  ValidationError,
} from '../lib/errors.js';

import {
  type FieldError,
  McpToolError,
  type ToolErrorPayload,
  ValidationError,
} from '../lib/errors.js';

export type ZodIssueLike = {
  code: string;
  path?: ReadonlyArray<PropertyKey>;
  message: string;
  input?: unknown;
};

const mapZodIssueToFieldError = (issue: ZodIssueLike): FieldError => {
  const field = issue.path?.length ? issue.path.map(String).join('.') : 'value';
  let code: string | undefined;

  if (issue.code === 'invalid_type') {
    // zod only keeps `input` on issues when asked to report it
    const missing =
      'input' in issue ? issue.input === undefined : /received undefined$/.test(issue.message);
    code = missing ? 'required' : 'type';
  } else if (issue.code === 'custom' || issue.code === 'invalid_value') {
    code = 'invalid';
  } else if (issue.code === 'unrecognized_keys') {
    code = 'unknown';
  }

  return {
    field,
    message: issue.message,
    code,
  };
};

export const toValidationErrorFromZod = (
  message: string,
  issues: readonly ZodIssueLike[]
): ValidationError => {
  const fieldErrors = issues.map(mapZodIssueToFieldError);
  return new ValidationError(message, fieldErrors);
};

export const toToolErrorPayload = (error: unknown): ToolErrorPayload => {
  if (error instanceof McpToolError) {
    return error.toPayload();
  }
  return {
    error: {
      code: 'internal_error',
      message: error instanceof Error ? error.message : String(error),
    },
  };
};
