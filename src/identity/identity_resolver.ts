/***
 *
 * IdentityResolver - Lazy id assignment, id -> entity lookup, and repair
 * of ids duplicated behind the allocator's back.
 *
 * There is no index. The host owns entity lifetime (create, delete, undo,
 * duplicate, link) and gives no notification for any of it, so every
 * entry point takes a fresh linear scan of the pool instead of trusting
 * anything remembered from a previous call.
 *
 * Duplication is the interesting case. Copying an entity copies its
 * stored id, and nothing tells us the copy happened. So ensure_id and
 * resolve both run a collision check on the id they touch: the first
 * holder in scan order keeps the id, every later holder gets a fresh one.
 * A collision goes unnoticed until one of its holders passes through here
 * (or until repair_all runs).
 *
 * Scans only read. Writes happen after the scan has finished, so host
 * storage is never mutated while its iterators are live.
 *
 ***/

import type { IDRefHost } from "../host";
import type { CounterRegistry } from "../counter/counter_registry";
import {
  as_unique_id,
  is_stored_id,
  to_effective_id,
  type UniqueID,
} from "../unique_id";
import type { Logger } from "../utils/logger";
import { scan_pool, type PoolEntry } from "./pool_scan";

export interface RepairReport<E> {
  readonly entity: E;
  readonly previous_id: UniqueID;
  readonly id: UniqueID;
}

interface Survey<E> {
  /** Highest raw id stored anywhere in the pool (0 if none). */
  max_raw: number;
  /** Entries whose effective id equals the surveyed id, in scan order. */
  holders: PoolEntry<E>[];
}

export class IdentityResolver<E> {
  constructor(
    private readonly host: IDRefHost<E>,
    private readonly registry: CounterRegistry<E>,
    private readonly logger: Logger,
    private readonly library_id_space: number,
  ) {}

  //=========================================================
  // Queries
  //=========================================================

  /**
   * The entity's effective id, or undefined if it has never been assigned.
   * Never allocates and never checks for collisions.
   */
  public peek_id(entity: E): UniqueID | undefined {
    const raw = this.host.read_id(entity);
    return is_stored_id(raw) ? this.effective(entity, raw) : undefined;
  }

  /**
   * Find the entity currently holding `id`, or undefined if none does
   * (deleted, or never assigned). Repairs any collision on `id` first,
   * so the returned entity is the one that keeps it.
   */
  public resolve(id: number): E | undefined {
    if (!is_stored_id(id)) return undefined;
    const target = as_unique_id(id);
    const { holders, max_raw } = this.survey(target);
    this.repair(target, holders, max_raw);
    return holders.length > 0 ? holders[0].entity : undefined;
  }

  //=========================================================
  // Mutations
  //=========================================================

  /**
   * Return the entity's id, assigning one on first access.
   *
   * Side effects: writes the entity's id slot when it was unset, and
   * reassigns any entity that shares the id but sits later in scan order
   * (possibly `entity` itself).
   */
  public ensure_id(entity: E): UniqueID {
    const current = this.peek_id(entity);

    if (current === undefined) {
      const { max_raw } = this.survey();
      const raw = this.allocate(max_raw);
      this.host.write_id(entity, raw);
      const id = this.effective(entity, raw);
      this.logger.debug("assigned id", { name: this.host.name_of(entity), id });
      return id;
    }

    const { holders, max_raw } = this.survey(current);
    const repairs = this.repair(current, holders, max_raw);
    for (const report of repairs) {
      if (report.entity === entity) return report.id;
    }
    return current;
  }

  /**
   * Repair every duplicated id in the pool in one pass. Meant to run after
   * the host loads a file; the lazy per-call checks still apply afterwards.
   */
  public repair_all(): RepairReport<E>[] {
    const held = new Set<number>();
    const losers: { entry: PoolEntry<E>; previous_id: UniqueID }[] = [];
    let max_raw = 0;

    for (const entry of scan_pool(this.host)) {
      const raw = this.host.read_id(entry.entity);
      if (!is_stored_id(raw)) continue;
      if (raw > max_raw) max_raw = raw;

      const id = this.effective(entry.entity, raw);
      if (held.has(id)) losers.push({ entry, previous_id: id });
      else held.add(id);
    }

    const reports = losers.map(({ entry, previous_id }) =>
      this.reassign(entry, previous_id, max_raw),
    );
    if (reports.length > 0) {
      this.logger.info("repaired duplicated ids", { count: reports.length });
    }
    return reports;
  }

  //=========================================================
  // Internal
  //=========================================================

  private survey(target?: number): Survey<E> {
    const holders: PoolEntry<E>[] = [];
    let max_raw = 0;

    for (const entry of scan_pool(this.host)) {
      const raw = this.host.read_id(entry.entity);
      if (!is_stored_id(raw)) continue;
      if (raw > max_raw) max_raw = raw;
      if (target !== undefined && this.effective(entry.entity, raw) === target) {
        holders.push(entry);
      }
    }
    return { holders, max_raw };
  }

  // Tie-break: holders[0] (first in scan order) keeps the id.
  private repair(
    id: UniqueID,
    holders: PoolEntry<E>[],
    max_raw: number,
  ): RepairReport<E>[] {
    const reports: RepairReport<E>[] = [];
    for (let i = 1; i < holders.length; i++) {
      reports.push(this.reassign(holders[i], id, max_raw));
    }
    return reports;
  }

  private reassign(
    { entity, namespace }: PoolEntry<E>,
    previous_id: UniqueID,
    max_raw: number,
  ): RepairReport<E> {
    const raw = this.allocate(max_raw);
    this.host.write_id(entity, raw);
    const id = this.effective(entity, raw);
    this.logger.warn("repaired id collision", {
      name: this.host.name_of(entity),
      namespace,
      previous_id,
      id,
    });
    return { entity, previous_id, id };
  }

  private allocate(max_raw: number): UniqueID {
    this.registry.sync();
    this.registry.reconcile(max_raw);
    return this.registry.next();
  }

  private effective(entity: E, raw: number): UniqueID {
    return to_effective_id(
      raw,
      this.host.library_of?.(entity),
      this.library_id_space,
    );
  }
}
