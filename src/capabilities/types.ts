import type { ToolAnnotations } from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';

import { toValidationErrorFromZod } from '../mcp/errors.js';

export const RESOURCE_MIME_TYPES = ['application/json', 'text/plain'] as const;
export type ResourceMimeType = (typeof RESOURCE_MIME_TYPES)[number];

export interface ResourceRecord {
  uri: string;
  mimeType: ResourceMimeType;
  text: string;
}

type MaybePromise<T> = T | Promise<T>;

export type ToolSpec<Schema extends z.ZodObject> = {
  /** `{framework}-{action}`, lowercase and hyphen separated. */
  name: string;
  title?: string;
  description: string;
  /** Argument object; `z.object({})` for tools that take no arguments. */
  inputSchema: Schema;
  annotations?: ToolAnnotations;
  handler: (args: z.output<Schema>) => MaybePromise<string>;
};

/**
 * A tool with its argument schema bound in. `invoke` validates raw arguments
 * before the handler runs, so callers can pass whatever the client sent.
 */
export interface ToolDefinition {
  readonly kind: 'tool';
  readonly name: string;
  readonly title?: string;
  readonly description: string;
  readonly inputSchema: z.ZodObject;
  readonly annotations?: ToolAnnotations;
  invoke(args: unknown): Promise<string>;
}

export type ResourceSpec = {
  uri: string;
  name: string;
  title?: string;
  description: string;
  mimeType: ResourceMimeType;
  read: () => MaybePromise<ResourceRecord>;
};

export interface ResourceDefinition {
  readonly kind: 'resource';
  readonly uri: string;
  readonly name: string;
  readonly title?: string;
  readonly description: string;
  readonly mimeType: ResourceMimeType;
  read(): Promise<ResourceRecord>;
}

/**
 * Anything that contributes tools or resources to the capability index.
 */
export interface Capability {
  tools?(): ToolDefinition[];
  resources?(): ResourceDefinition[];
}

export const defineTool = <Schema extends z.ZodObject>(spec: ToolSpec<Schema>): ToolDefinition => {
  const schema = spec.inputSchema;

  return {
    kind: 'tool',
    name: spec.name,
    title: spec.title,
    description: spec.description,
    inputSchema: schema,
    annotations: spec.annotations,
    async invoke(args: unknown) {
      const parsed = await schema.safeParseAsync(args ?? {});
      if (!parsed.success) {
        throw toValidationErrorFromZod(`Invalid arguments for tool ${spec.name}.`, parsed.error.issues);
      }
      return spec.handler(parsed.data);
    },
  };
};

export const defineResource = (spec: ResourceSpec): ResourceDefinition => ({
  kind: 'resource',
  uri: spec.uri,
  name: spec.name,
  title: spec.title,
  description: spec.description,
  mimeType: spec.mimeType,
  async read() {
    return spec.read();
  },
});
