import { z } from 'zod';

import { NotFoundError } from '../lib/errors.js';

export const ENTITY_KINDS = ['service', 'library', 'dataset'] as const;
export type EntityKind = (typeof ENTITY_KINDS)[number];

export const entitySchema = z.object({
  id: z.string(),
  name: z.string(),
  kind: z.enum(ENTITY_KINDS),
  tags: z.array(z.string()),
});

export type Entity = z.infer<typeof entitySchema>;

const DEFAULT_ENTITIES: readonly Entity[] = [
  { id: 'alpha', name: 'Alpha', kind: 'service', tags: ['core', 'http'] },
  { id: 'beta', name: 'Beta', kind: 'library', tags: ['core'] },
  { id: 'gamma', name: 'Gamma', kind: 'service', tags: ['queue'] },
  { id: 'delta', name: 'Delta', kind: 'dataset', tags: ['analytics', 'core'] },
];

/**
 * Read-only entity source. Every call hands out fresh copies, so callers may
 * mutate what they get without affecting later reads.
 */
export class EntityCatalog {
  private readonly entities: readonly Entity[];

  constructor(entities: readonly Entity[] = DEFAULT_ENTITIES) {
    this.entities = entities;
  }

  list(): Entity[] {
    return this.entities.map(copyEntity);
  }

  get(id: string): Entity {
    const entity = this.entities.find(entry => entry.id === id);
    if (!entity) {
      throw new NotFoundError(`Entity ${id} not found.`, { id });
    }
    return copyEntity(entity);
  }
}

const copyEntity = (entity: Entity): Entity => ({ ...entity, tags: [...entity.tags] });
