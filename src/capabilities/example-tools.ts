import { z } from 'zod';

import { encodePayload } from '../lib/json.js';
import type { EntityAnalyzer } from '../services/entity-analyzer.js';
import {
  ENTITY_KINDS,
  type EntityCatalog,
  type EntityKind,
  entitySchema,
} from '../services/entity-catalog.js';
import { type Capability, defineTool, type ToolDefinition } from './types.js';

export const entityListSchema = z.object({
  entities: z.array(entitySchema),
});

export const entityDetailSchema = z.object({
  entity: entitySchema,
});

export const entitySummarySchema = z.object({
  kind: z.enum(ENTITY_KINDS).nullable(),
  total: z.number().int().nonnegative(),
  byKind: z.partialRecord(z.enum(ENTITY_KINDS), z.number().int().nonnegative()),
  tags: z.array(z.string()),
});

export type ExampleToolAction = 'list-entities' | 'get-entity' | 'summarize-entities';

/**
 * Example tools over the entity catalog. Each returns a JSON string whose
 * shape is fixed by the schema next to it. Names are `{framework}-{action}`.
 */
export class ExampleTools implements Capability {
  constructor(
    private readonly catalog: EntityCatalog,
    private readonly analyzer: EntityAnalyzer,
    private readonly framework: string
  ) {}

  toolName(action: ExampleToolAction) {
    return `${this.framework}-${action}`;
  }

  tools(): ToolDefinition[] {
    return [
      defineTool({
        name: this.toolName('list-entities'),
        title: 'List Entities',
        description: 'List every entity in the example catalog with its kind and tags.',
        inputSchema: z.object({}),
        annotations: { readOnlyHint: true, idempotentHint: true },
        handler: () => this.listEntities(),
      }),
      defineTool({
        name: this.toolName('get-entity'),
        title: 'Get Entity',
        description: 'Read one entity from the example catalog by id.',
        inputSchema: z.object({
          id: z.string().min(1).describe(`Entity id, e.g. "alpha". See ${this.toolName('list-entities')}.`),
        }),
        annotations: { readOnlyHint: true, idempotentHint: true },
        handler: ({ id }) => this.getEntity(id),
      }),
      defineTool({
        name: this.toolName('summarize-entities'),
        title: 'Summarize Entities',
        description: 'Count catalog entities per kind and collect their tags, optionally for one kind.',
        inputSchema: z.object({
          kind: z.enum(ENTITY_KINDS).optional().describe(`One of: ${ENTITY_KINDS.join(', ')}.`),
        }),
        annotations: { readOnlyHint: true, idempotentHint: true },
        handler: ({ kind }) => this.summarizeEntities(kind),
      }),
    ];
  }

  listEntities(): string {
    return encodePayload(
      entityListSchema,
      { entities: this.catalog.list() },
      `${this.toolName('list-entities')} result`
    );
  }

  getEntity(id: string): string {
    return encodePayload(
      entityDetailSchema,
      { entity: this.catalog.get(id) },
      `${this.toolName('get-entity')} result`
    );
  }

  summarizeEntities(kind?: EntityKind): string {
    const entities = this.catalog.list().filter(entity => !kind || entity.kind === kind);
    const summary = this.analyzer.summarize(entities);
    return encodePayload(
      entitySummarySchema,
      { kind: kind ?? null, ...summary },
      `${this.toolName('summarize-entities')} result`
    );
  }
}
