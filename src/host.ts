/***
 * Host boundary — what the resolver needs from the application that owns
 * the entities.
 *
 * The core never creates or destroys entities; it only reads and writes
 * two kinds of integer slots on them (the entity's own id and the ids held
 * by its reference fields) and walks the pool. `E` is whatever handle the
 * host uses for an entity; handles are compared with ===.
 *
 ***/

export interface Namespace<E> {
  readonly name: string;
  /** Members of this namespace. Order must be stable within one scan. */
  entities(): Iterable<E>;
  /** Persisted "next id" slot, if the host keeps one per namespace. */
  read_counter?(): number | undefined;
  write_counter?(value: number): void;
}

export interface IDRefHost<E> {
  /** Every live namespace. An entity may belong to more than one. */
  namespaces(): Iterable<Namespace<E>>;

  /** Raw stored id; undefined or 0 mean unset. */
  read_id(entity: E): number | undefined;
  write_id(entity: E, id: number): void;

  /** Stored target id of a reference field; undefined or 0 mean empty. */
  read_field(entity: E, key: string): number | undefined;
  write_field(entity: E, key: string, id: number): void;

  name_of(entity: E): string;
  find_by_name(name: string): E | undefined;

  /** Index of the external library the entity was linked from, if any. */
  library_of?(entity: E): number | undefined;
}
