import type { ChangeHashStore } from '@collector/shared';

export interface DiscoveredEntity {
  id: string;
  hash: string;
}

/**
 * Entities whose discovered hash differs from the stored one, or that have
 * no stored hash yet. Discovery order is preserved.
 */
export function filterChanged<T extends DiscoveredEntity>(
  discovered: readonly T[],
  stored: ReadonlyMap<string, string>,
): T[] {
  return discovered.filter((entity) => stored.get(entity.id) !== entity.hash);
}

/**
 * Runs the detail fetch-and-persist for one changed entity, then advances its
 * stored hash. A failure in `work` propagates and leaves the hash untouched.
 */
export async function commitAfterPersist<R>(
  store: ChangeHashStore,
  source: string,
  entity: DiscoveredEntity,
  work: () => Promise<R>,
): Promise<R> {
  const result = await work();
  await store.updateStoredHash(source, entity.id, entity.hash);
  return result;
}
