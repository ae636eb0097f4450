import { EntityDependencies } from '../../config/constants.js';
import type { EntityKindType } from '../../config/constants.js';

/**
 * Topological order of a dependency graph: every entity comes after the
 * entities it references. Ties keep the graph's declaration order.
 */
export function persistenceOrder(
  dependencies: Record<EntityKindType, EntityKindType[]>
): EntityKindType[] {
  const kinds = Object.keys(dependencies).filter(
    (kind): kind is EntityKindType => kind in dependencies
  );
  const remaining = new Map<EntityKindType, Set<EntityKindType>>(
    kinds.map((kind) => [kind, new Set(dependencies[kind])])
  );
  const order: EntityKindType[] = [];

  while (remaining.size > 0) {
    const ready = [...remaining.keys()].filter((kind) => remaining.get(kind)?.size === 0);

    if (ready.length === 0) {
      throw new Error(`Entity dependencies contain a cycle: ${[...remaining.keys()].join(', ')}`);
    }

    for (const kind of ready) {
      order.push(kind);
      remaining.delete(kind);
      for (const pending of remaining.values()) {
        pending.delete(kind);
      }
    }
  }

  return order;
}

export const PERSISTENCE_ORDER: readonly EntityKindType[] = persistenceOrder(EntityDependencies);
