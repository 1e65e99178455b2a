import type { IDRefHost } from "../host";

export interface PoolEntry<E> {
  readonly entity: E;
  /** First namespace the entity was seen in. */
  readonly namespace: string;
}

/**
 * Walk every distinct entity of the pool: namespaces in host order, then
 * members in namespace order. An entity linked into several namespaces is
 * yielded once, at its first position.
 */
export function* scan_pool<E>(host: IDRefHost<E>): Generator<PoolEntry<E>> {
  const seen = new Set<E>();
  for (const ns of host.namespaces()) {
    for (const entity of ns.entities()) {
      if (seen.has(entity)) continue;
      seen.add(entity);
      yield { entity, namespace: ns.name };
    }
  }
}
