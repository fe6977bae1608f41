import type { Entity, EntityKind } from './entity-catalog.js';

export type EntitySummary = {
  total: number;
  byKind: Partial<Record<EntityKind, number>>;
  tags: string[];
};

export class EntityAnalyzer {
  summarize(entities: readonly Entity[]): EntitySummary {
    const byKind: Partial<Record<EntityKind, number>> = {};
    const tags = new Set<string>();

    for (const entity of entities) {
      byKind[entity.kind] = (byKind[entity.kind] ?? 0) + 1;
      for (const tag of entity.tags) tags.add(tag);
    }

    return {
      total: entities.length,
      byKind,
      tags: [...tags].sort(),
    };
  }
}
