import debug from '../util/debug.js';
import {
  type Capability,
  RESOURCE_MIME_TYPES,
  type ResourceDefinition,
  type ResourceRecord,
  type ToolDefinition,
} from './capabilities/types.js';
import { isJsonText } from './lib/json.js';
import {
  ConflictError,
  InvalidRequestError,
  ResourceContractError,
  SerializationError,
} from './lib/errors.js';

export const TOOL_NAME_PATTERN = /^[a-z][a-z0-9]*(?:-[a-z0-9]+)+$/;
export const RESOURCE_URI_PATTERN = /^([a-z][a-z0-9+.-]*):\/\/(\S+)$/;

const RECORD_KEYS = ['mimeType', 'text', 'uri'];

export type CapabilityRegistryOptions = {
  /** Required first segment of every tool name. */
  framework?: string;
  /** Required scheme of every resource URI. */
  scheme?: string;
};

export type CapabilityIndex = {
  tools: Array<{ name: string; title?: string; description: string }>;
  resources: Array<{ uri: string; name: string; mimeType: string; description: string }>;
};

/**
 * Index of tools by name and resources by URI. Enforces the naming
 * conventions at registration time and the output contract on every call.
 */
export class CapabilityRegistry {
  private readonly toolsByName = new Map<string, ToolDefinition>();
  private readonly resourcesByUri = new Map<string, ResourceDefinition>();
  private readonly framework?: string;
  private readonly scheme?: string;

  constructor(options: CapabilityRegistryOptions = {}) {
    this.framework = options.framework;
    this.scheme = options.scheme;
  }

  registerTool(tool: ToolDefinition): void {
    if (!TOOL_NAME_PATTERN.test(tool.name)) {
      throw new InvalidRequestError(
        `Tool name ${tool.name} must be lowercase and hyphen separated, as {framework}-{action}.`
      );
    }
    if (this.framework && !tool.name.startsWith(`${this.framework}-`)) {
      throw new InvalidRequestError(`Tool name ${tool.name} must start with "${this.framework}-".`);
    }
    if (!tool.description.trim()) {
      throw new InvalidRequestError(`Tool ${tool.name} needs a description.`);
    }
    if (this.toolsByName.has(tool.name)) {
      throw new ConflictError(`Tool ${tool.name} is already registered.`);
    }
    this.toolsByName.set(tool.name, tool);
    debug.registry(`Registered tool ${tool.name}`);
  }

  registerResource(resource: ResourceDefinition): void {
    const match = RESOURCE_URI_PATTERN.exec(resource.uri);
    if (!match) {
      throw new InvalidRequestError(`Resource URI ${resource.uri} must look like {scheme}://{path}.`);
    }
    if (this.scheme && match[1] !== this.scheme) {
      throw new InvalidRequestError(`Resource URI ${resource.uri} must use the ${this.scheme}:// scheme.`);
    }
    if (!RESOURCE_MIME_TYPES.includes(resource.mimeType)) {
      throw new InvalidRequestError(`Resource ${resource.uri} has unsupported mimeType ${resource.mimeType}.`);
    }
    if (this.resourcesByUri.has(resource.uri)) {
      throw new ConflictError(`Resource ${resource.uri} is already registered.`);
    }
    this.resourcesByUri.set(resource.uri, resource);
    debug.registry(`Registered resource ${resource.uri}`);
  }

  registerCapability(capability: Capability): void {
    for (const tool of capability.tools?.() ?? []) this.registerTool(tool);
    for (const resource of capability.resources?.() ?? []) this.registerResource(resource);
  }

  listTools(): ToolDefinition[] {
    return [...this.toolsByName.values()];
  }

  listResources(): ResourceDefinition[] {
    return [...this.resourcesByUri.values()];
  }

  getTool(name: string): ToolDefinition {
    const tool = this.toolsByName.get(name);
    if (!tool) {
      throw new InvalidRequestError(`Tool ${name} not found.`, {
        availableTools: [...this.toolsByName.keys()],
      });
    }
    return tool;
  }

  getResource(uri: string): ResourceDefinition {
    const resource = this.resourcesByUri.get(uri);
    if (!resource) {
      throw new InvalidRequestError(`Resource ${uri} not found.`, {
        availableResources: [...this.resourcesByUri.keys()],
      });
    }
    return resource;
  }

  async invokeTool(name: string, args?: unknown): Promise<string> {
    const tool = this.getTool(name);
    debug.tools(`Invoking ${name}`);
    const text = await tool.invoke(args);
    if (typeof text !== 'string' || !isJsonText(text)) {
      throw new SerializationError(`Tool ${name} did not return a JSON string.`);
    }
    return text;
  }

  async readResource(uri: string): Promise<ResourceRecord> {
    const resource = this.getResource(uri);
    debug.resources(`Reading ${uri}`);
    const record = await resource.read();
    assertResourceRecord(resource, record);
    return record;
  }

  describe(): CapabilityIndex {
    return {
      tools: this.listTools().map(({ name, title, description }) => ({ name, title, description })),
      resources: this.listResources().map(({ uri, name, mimeType, description }) => ({
        uri,
        name,
        mimeType,
        description,
      })),
    };
  }
}

const assertResourceRecord = (resource: ResourceDefinition, record: ResourceRecord) => {
  const keys = Object.keys(record).sort();
  if (keys.length !== RECORD_KEYS.length || keys.some((key, index) => key !== RECORD_KEYS[index])) {
    throw new ResourceContractError(
      `Resource ${resource.uri} must return exactly uri, mimeType and text.`,
      { keys }
    );
  }
  if (record.uri !== resource.uri) {
    throw new ResourceContractError(
      `Resource ${resource.uri} returned a record for ${record.uri}.`
    );
  }
  if (record.mimeType !== resource.mimeType) {
    throw new ResourceContractError(
      `Resource ${resource.uri} declared ${resource.mimeType} but returned ${record.mimeType}.`
    );
  }
  if (typeof record.text !== 'string') {
    throw new ResourceContractError(`Resource ${resource.uri} returned non-string text.`);
  }
  if (record.mimeType === 'application/json' && !isJsonText(record.text)) {
    throw new ResourceContractError(`Resource ${resource.uri} returned text that is not valid JSON.`);
  }
};
