import { z } from 'zod';

import type { ExtensionSettings } from '../settings.js';
import { schemaResource, textResource } from './records.js';
import { type Capability, defineResource, type ResourceDefinition } from './types.js';

export const extensionConfigSchema = z.object({
  name: z.string(),
  version: z.string(),
  scheme: z.string(),
  framework: z.string(),
});

type ReadmeSettings = Pick<ExtensionSettings, 'name' | 'framework' | 'scheme'>;

export const readmeText = ({ name, framework, scheme }: ReadmeSettings) => `${name} MCP extension

Tools:
- ${framework}-list-entities: list the entity catalog
- ${framework}-get-entity: read one entity by id
- ${framework}-summarize-entities: count entities per kind

Resources:
- ${scheme}://config: extension settings (application/json)
- ${scheme}://readme: this text (text/plain)
`;

export class ExampleResources implements Capability {
  constructor(private readonly settings: ExtensionSettings) {}

  get configUri() {
    return `${this.settings.scheme}://config`;
  }

  get readmeUri() {
    return `${this.settings.scheme}://readme`;
  }

  resources(): ResourceDefinition[] {
    return [
      defineResource({
        uri: this.configUri,
        name: 'config',
        title: 'Extension Configuration',
        description: 'Name, version and naming conventions of this extension.',
        mimeType: 'application/json',
        read: () => this.readConfig(),
      }),
      defineResource({
        uri: this.readmeUri,
        name: 'readme',
        title: 'Extension Readme',
        description: 'Plain-text overview of the tools and resources this extension provides.',
        mimeType: 'text/plain',
        read: () => textResource(this.readmeUri, readmeText(this.settings)),
      }),
    ];
  }

  readConfig() {
    const { name, version, scheme, framework } = this.settings;
    return schemaResource(this.configUri, extensionConfigSchema, { name, version, scheme, framework });
  }
}
