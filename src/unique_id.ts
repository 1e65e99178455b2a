/***
 * UniqueID — Branded positive integer identifying one entity of a kind.
 *
 * Hosts store raw ids: the value the counter handed out. Entities linked
 * in from an external library keep the raw id they had in their own file,
 * so their effective id is shifted into a per-library band:
 *
 *   effective = raw + (library_index + 1) * library_id_space
 *
 * Local entities (no library) have effective === raw. Everything above the
 * host boundary (resolve, references, collision checks) uses effective ids.
 *
 ***/

import { Brand, validate_and_cast, is_positive_safe_integer } from "./type_primitives";

export type UniqueID = Brand<number, "unique_id">;

export const as_unique_id = (value: number) =>
  validate_and_cast<number, UniqueID>(
    value,
    is_positive_safe_integer,
    "UniqueID must be a positive integer",
  );

/** A stored value counts as an id only if it is a positive integer. */
export const is_stored_id = (value: number | undefined): value is number =>
  value !== undefined && is_positive_safe_integer(value);

export const to_effective_id = (
  raw: number,
  library_index: number | undefined,
  library_id_space: number,
): UniqueID =>
  as_unique_id(
    library_index === undefined ? raw : raw + (library_index + 1) * library_id_space,
  );
