import debugModule from 'debug';

const REDACTED_KEYS = ['password', 'secret', 'token', 'accessToken', 'apiKey', 'authorization'];

export interface FailureContext {
  tool?: string;
  resource?: string;
  args?: unknown;
  error: Error;
}

/** Copy of `value` with credential-like keys replaced, at any depth. */
export const sanitizeForLogging = (value: unknown): unknown => {
  if (Array.isArray(value)) return value.map(sanitizeForLogging);
  if (!value || typeof value !== 'object') return value;
  return Object.fromEntries(
    Object.entries(value).map(([key, entry]) => [
      key,
      REDACTED_KEYS.includes(key) ? '<redacted>' : sanitizeForLogging(entry),
    ])
  );
};

const errorLog = debugModule('mcp-extension:error');

const logFailure = (message: string, { tool, resource, args, error }: FailureContext) => {
  errorLog(message);
  if (tool) errorLog(`in tool <${tool}>, arguments: %O`, sanitizeForLogging(args));
  if (resource) errorLog(`in resource <${resource}>`);
  errorLog(error.stack ?? String(error));
};

const debug = {
  app: debugModule('mcp-extension:app'),
  container: debugModule('mcp-extension:container'),
  registry: debugModule('mcp-extension:registry'),
  manifest: debugModule('mcp-extension:manifest'),
  tools: debugModule('mcp-extension:tools'),
  resources: debugModule('mcp-extension:resources'),
  error: logFailure,
};

export default debug;
