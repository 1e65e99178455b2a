/***
 *
 * CounterRegistry - Hands out unique ids from one value-space shared by
 * every namespace of the host.
 *
 * The registry never trusts its own state alone. Before an allocation the
 * caller (IdentityResolver) scans the pool and passes the highest raw id
 * it saw to reconcile(); sync() folds in any counter slots the namespaces
 * persist. After every allocation all namespace slots are rewritten to the
 * same value, so whichever one the host saves, it cannot lag behind.
 *
 ***/

import type { IDRefHost } from "../host";
import { as_unique_id, type UniqueID } from "../unique_id";
import type { Logger } from "../utils/logger";
import type { CounterState } from "./counter_state";

export class CounterRegistry<E> {
  constructor(
    private readonly host: IDRefHost<E>,
    private readonly state: CounterState,
    private readonly logger: Logger,
  ) {}

  //=========================================================
  // Queries
  //=========================================================

  /** Value the next call to next() would return, without advancing. */
  public peek(): number {
    return this.state.next;
  }

  //=========================================================
  // Floor maintenance
  //=========================================================

  /**
   * Record that `value` was handed out through a channel the registry
   * does not control (restored from storage, set by the host).
   * Future ids are strictly greater than it. Values that are not safe
   * non-negative integers are ignored.
   */
  public observe(namespace: string, value: number): void {
    if (!Number.isSafeInteger(value) || value < 0) {
      this.logger.debug("ignored non-id counter observation", {
        namespace,
        value,
      });
      return;
    }
    if (this.state.raise_to(value + 1)) {
      this.logger.debug("counter floor raised by observation", {
        namespace,
        next: this.state.next,
      });
    }
  }

  /** Raise the floor above the highest id present in the pool. */
  public reconcile(max_present: number): void {
    this.state.raise_to(max_present + 1);
  }

  /**
   * Fold in every namespace's persisted counter slot. A slot holds the
   * next value to hand out, so it is a floor as-is.
   */
  public sync(): void {
    for (const ns of this.host.namespaces()) {
      const slot = ns.read_counter?.();
      if (slot !== undefined && Number.isSafeInteger(slot)) {
        this.state.raise_to(slot);
      }
    }
  }

  //=========================================================
  // Allocation
  //=========================================================

  /**
   * Hand out the next id and advance. Every namespace with a counter
   * slot is rewritten to the new floor.
   */
  public next(): UniqueID {
    const id = as_unique_id(this.state.take());
    const next = this.state.next;
    for (const ns of this.host.namespaces()) {
      ns.write_counter?.(next);
    }
    return id;
  }
}
