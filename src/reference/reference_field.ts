/***
 * ReferenceField — A pointer from one entity to another that survives
 * renames.
 *
 * Callers read and write the field as an entity handle (get/set) or as
 * the target's display name (get_name/set_name, what a UI binds to). What
 * is stored on the owner is the target's unique id, under the key
 * `<key>_id`. Reading resolves the id against the pool every time, so the
 * name shown is always the target's current one, and a deleted target
 * reads back as unresolved rather than failing.
 *
 * Usage:
 *
 *   const Target = refs.define_reference({
 *     key: "track_target",
 *     display_name: "Track Target",
 *     validator: (e) => e.type === "camera",
 *   });
 *
 *   Target.set(owner, camera);
 *   camera.name = "Main Camera";
 *   Target.get_name(owner); // "Main Camera"
 *
 ***/

import type { IDRefHost } from "../host";
import type { IdentityResolver } from "../identity/identity_resolver";
import { scan_pool } from "../identity/pool_scan";
import { is_stored_id } from "../unique_id";
import { UNSET_ID } from "../utils/constants";
import { IDREF_ERROR, IDRefError, ValidationError } from "../utils/error";

export type ReferenceValidator<E> = (entity: E) => boolean;

export interface ReferenceOptions<E> {
  /** Storage key stem. The id is stored under `${key}_id`. */
  key: string;
  /** Label for the UI. Passed through untouched. */
  display_name?: string;
  /** Which entities may be targeted. Defaults to any. */
  validator?: ReferenceValidator<E>;
}

/** Presentation-agnostic model for a name-searchable picker widget. */
export interface PickerModel {
  readonly label: string;
  /** Current target name, "" when unresolved. */
  readonly value: string;
  /** Names of valid targets matching the search, in pool order. */
  readonly candidates: readonly string[];
}

const accept_any = (): boolean => true;

export class ReferenceField<E> {
  public readonly key: string;
  public readonly value_key: string;
  public readonly display_name: string;
  private readonly validator: ReferenceValidator<E>;

  constructor(
    private readonly host: IDRefHost<E>,
    private readonly resolver: IdentityResolver<E>,
    value_key: string,
    options: ReferenceOptions<E>,
  ) {
    this.key = options.key;
    this.value_key = value_key;
    this.display_name = options.display_name ?? options.key;
    this.validator = options.validator ?? accept_any;
  }

  //=========================================================
  // Entity access
  //=========================================================

  /** The stored target id, or undefined when the field is empty. */
  public peek(owner: E): number | undefined {
    const stored = this.host.read_field(owner, this.value_key);
    return is_stored_id(stored) ? stored : undefined;
  }

  /** The referenced entity, or undefined if empty or no longer present. */
  public get(owner: E): E | undefined {
    const stored = this.peek(owner);
    return stored === undefined ? undefined : this.resolver.resolve(stored);
  }

  /**
   * Point the field at `target` (undefined clears it). Assigns the target
   * an id if it has none yet.
   *
   * Throws ValidationError, leaving the field untouched, when the target
   * fails the validator.
   */
  public set(owner: E, target: E | undefined): void {
    if (target === undefined) {
      this.clear(owner);
      return;
    }
    if (!this.validator(target)) {
      throw new ValidationError(
        `"${this.host.name_of(target)}" is not a valid target for ${this.display_name}`,
        { key: this.key, target: this.host.name_of(target) },
      );
    }
    const id = this.resolver.ensure_id(target);
    this.host.write_field(owner, this.value_key, id);
  }

  public clear(owner: E): void {
    this.host.write_field(owner, this.value_key, UNSET_ID);
  }

  public is_valid_target(entity: E): boolean {
    return this.validator(entity);
  }

  //=========================================================
  // Name access
  //=========================================================

  /** Current name of the target, "" when unresolved. */
  public get_name(owner: E): string {
    const target = this.get(owner);
    return target === undefined ? "" : this.host.name_of(target);
  }

  /**
   * Point the field at the entity named `name` ("" clears).
   * Throws IDRefError(TARGET_NOT_FOUND) if no entity has that name, and
   * ValidationError if it fails the validator; the field is untouched in
   * both cases.
   */
  public set_name(owner: E, name: string): void {
    if (name === "") {
      this.clear(owner);
      return;
    }
    const target = this.host.find_by_name(name);
    if (target === undefined) {
      throw new IDRefError(
        IDREF_ERROR.TARGET_NOT_FOUND,
        `No entity named "${name}"`,
        { key: this.key, name },
      );
    }
    this.set(owner, target);
  }

  //=========================================================
  // UI
  //=========================================================

  public picker(owner: E, query = ""): PickerModel {
    const needle = query.toLowerCase();
    const seen = new Set<string>();
    const candidates: string[] = [];

    for (const { entity } of scan_pool(this.host)) {
      if (!this.validator(entity)) continue;
      const name = this.host.name_of(entity);
      if (seen.has(name) || !name.toLowerCase().includes(needle)) continue;
      seen.add(name);
      candidates.push(name);
    }

    return {
      label: this.display_name,
      value: this.get_name(owner),
      candidates,
    };
  }
}
