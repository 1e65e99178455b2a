/***
 *
 * CounterState - The next id a kind will hand out.
 *
 * One instance per entity kind. It is owned by whoever constructs the
 * IDRef (or the CounterRegistry directly) and injected, never reached
 * through a module global, so each test can start from a fresh state.
 * The core does not persist it: after a reload the floor is rebuilt from
 * the ids still present in the pool and from namespace counter slots.
 *
 ***/

import { FIRST_ID } from "../utils/constants";
import { IDREF_ERROR, IDRefError } from "../utils/error";

export class CounterState {
  private _next: number;

  /**
   * Values below FIRST_ID are raised to it; 0 is never an id.
   * Throws IDRefError(INVALID_OPTION) unless `next` is a safe integer.
   */
  constructor(next = FIRST_ID) {
    if (!Number.isSafeInteger(next)) {
      throw new IDRefError(
        IDREF_ERROR.INVALID_OPTION,
        "CounterState must start at a safe integer",
        { next },
      );
    }
    this._next = Math.max(next, FIRST_ID);
  }

  /** Value the next take() will return. */
  public get next(): number {
    return this._next;
  }

  /** Raise the floor. Never lowers it; ignores non-integer floors. */
  public raise_to(floor: number): boolean {
    if (!Number.isInteger(floor) || floor <= this._next) return false;
    this._next = floor;
    return true;
  }

  /**
   * Return the current value and advance. Throws
   * IDRefError(ID_SPACE_EXHAUSTED) once the value would leave the safe
   * integer range, where incrementing stops producing new values.
   */
  public take(): number {
    if (this._next > Number.MAX_SAFE_INTEGER) {
      throw new IDRefError(
        IDREF_ERROR.ID_SPACE_EXHAUSTED,
        "No safe integer ids left to hand out",
        { next: this._next },
      );
    }
    return this._next++;
  }
}
