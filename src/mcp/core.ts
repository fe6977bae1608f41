import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  CallToolRequestSchema,
  type CallToolResult,
  type ReadResourceResult,
} from '@modelcontextprotocol/sdk/types.js';

import debug from '../../util/debug.js';
import type { CapabilityRegistry } from '../registry.js';
import type { ExtensionSettings } from '../settings.js';
import { toToolErrorPayload } from './errors.js';

export type FormatToolResult = (text: string) => CallToolResult;

export interface CreateMcpServerOptions {
  registry: CapabilityRegistry;
  settings: Pick<ExtensionSettings, 'name' | 'version' | 'instructions'>;
}

const isJsonObject = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value);

export const formatToolResult: FormatToolResult = text => {
  const parsed: unknown = JSON.parse(text);
  return {
    content: [
      {
        type: 'text' as const,
        text,
      },
    ],
    ...(isJsonObject(parsed) ? { structuredContent: parsed } : {}),
  };
};

export const formatToolErrorResult = (error: unknown): CallToolResult => {
  const payload = toToolErrorPayload(error);
  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify(payload, null, 2),
      },
    ],
    structuredContent: payload,
    isError: true,
  };
};

/**
 * Expose every tool and resource in the registry on an MCP server. Tool
 * failures, invalid arguments and unknown tool names included, come back as
 * error results carrying a JSON error payload; resource failures are rethrown
 * for the SDK to report.
 */
export const createMcpServer = ({ registry, settings }: CreateMcpServerOptions) => {
  const server = new McpServer(
    {
      name: settings.name,
      version: settings.version,
    },
    settings.instructions ? { instructions: settings.instructions } : undefined
  );

  const callTool = async (name: string, args: unknown): Promise<CallToolResult> => {
    try {
      const text = await registry.invokeTool(name, args);
      return formatToolResult(text);
    } catch (error) {
      debug.error(`Tool ${name} failed.`, {
        tool: name,
        args,
        error: error instanceof Error ? error : new Error(String(error)),
      });
      return formatToolErrorResult(error);
    }
  };

  for (const tool of registry.listTools()) {
    server.registerTool(
      tool.name,
      {
        title: tool.title,
        description: tool.description,
        inputSchema: tool.inputSchema.shape,
        annotations: tool.annotations,
      },
      async args => callTool(tool.name, args)
    );
  }

  if (registry.listTools().length) {
    // Calls go straight to the registry, which validates arguments itself.
    server.server.setRequestHandler(CallToolRequestSchema, async request =>
      callTool(request.params.name, request.params.arguments)
    );
  }

  for (const resource of registry.listResources()) {
    server.registerResource(
      resource.name,
      resource.uri,
      {
        title: resource.title,
        description: resource.description,
        mimeType: resource.mimeType,
      },
      async (): Promise<ReadResourceResult> => {
        try {
          const record = await registry.readResource(resource.uri);
          return { contents: [record] };
        } catch (error) {
          debug.error(`Resource ${resource.uri} failed.`, {
            resource: resource.uri,
            error: error instanceof Error ? error : new Error(String(error)),
          });
          throw error;
        }
      }
    );
  }

  debug.app(
    `MCP server ${settings.name} exposes ${registry.listTools().length} tools and ${registry.listResources().length} resources`
  );

  return { server, registry };
};
