/***
 * IDRef — Public facade for one kind of entity.
 *
 * Composes a CounterRegistry (id allocation), an IdentityResolver (lazy
 * assignment, lookup, collision repair) and the ReferenceFields defined
 * for the kind. Each kind the host wants stable ids for (objects,
 * materials, ...) gets its own IDRef and its own CounterState.
 *
 * Usage:
 *
 *   const objects = new IDRef(host, { kind: "objects" });
 *
 *   const Parent = objects.define_reference({ key: "parent", display_name: "Parent" });
 *
 *   Parent.set(child, rig);
 *   objects.ensure_id(rig);   // same id Parent stored
 *   objects.resolve(id);      // rig, whatever it's called now
 *
 *   // after the host loads a file
 *   objects.repair_all();
 *
 ***/

import type { IDRefHost } from "./host";
import { CounterState } from "./counter/counter_state";
import { CounterRegistry } from "./counter/counter_registry";
import {
  IdentityResolver,
  type RepairReport,
} from "./identity/identity_resolver";
import {
  ReferenceField,
  type ReferenceOptions,
} from "./reference/reference_field";
import type { UniqueID } from "./unique_id";
import { is_positive_safe_integer } from "./type_primitives";
import { __DEV__ } from "./utils/env";
import { IDREF_ERROR, IDRefError } from "./utils/error";
import {
  create_console_logger,
  is_log_level,
  type LogLevel,
  type Logger,
} from "./utils/logger";
import {
  DEFAULT_KIND,
  DEFAULT_LIBRARY_ID_SPACE,
  DEFAULT_LOG_LEVEL,
  REFERENCE_KEY_SUFFIX,
} from "./utils/constants";

export interface IDRefOptions {
  /** Label for this kind of entity; prefixes log output. */
  kind?: string;
  /** Injected counter. Share one only between IDRefs over the same pool. */
  state?: CounterState;
  logger?: Logger;
  /** Threshold for the default console logger. Ignored if `logger` is set. */
  log_level?: LogLevel;
  library_id_space?: number;
}

export class IDRef<E> {
  public readonly kind: string;

  private readonly registry: CounterRegistry<E>;
  private readonly resolver: IdentityResolver<E>;
  private readonly fields: Map<string, ReferenceField<E>> = new Map();

  constructor(
    private readonly host: IDRefHost<E>,
    options?: IDRefOptions,
  ) {
    const log_level = options?.log_level ?? DEFAULT_LOG_LEVEL;
    const library_id_space =
      options?.library_id_space ?? DEFAULT_LIBRARY_ID_SPACE;

    if (__DEV__) {
      if (!is_log_level(log_level)) {
        throw new IDRefError(
          IDREF_ERROR.INVALID_OPTION,
          `Unknown log level "${log_level}"`,
        );
      }
      if (!is_positive_safe_integer(library_id_space)) {
        throw new IDRefError(
          IDREF_ERROR.INVALID_OPTION,
          "library_id_space must be a positive integer",
          { library_id_space },
        );
      }
    }

    this.kind = options?.kind ?? DEFAULT_KIND;
    const logger = options?.logger ?? create_console_logger(this.kind, log_level);
    this.registry = new CounterRegistry(
      host,
      options?.state ?? new CounterState(),
      logger,
    );
    this.resolver = new IdentityResolver(
      host,
      this.registry,
      logger,
      library_id_space,
    );
  }

  //=========================================================
  // Identity
  //=========================================================

  /** Id of `entity`, assigned on first access. See IdentityResolver.ensure_id. */
  public ensure_id(entity: E): UniqueID {
    return this.resolver.ensure_id(entity);
  }

  /** Id of `entity` without assigning one. */
  public peek_id(entity: E): UniqueID | undefined {
    return this.resolver.peek_id(entity);
  }

  /** Entity currently holding `id`, or undefined. */
  public resolve(id: number): E | undefined {
    return this.resolver.resolve(id);
  }

  public repair_all(): RepairReport<E>[] {
    return this.resolver.repair_all();
  }

  //=========================================================
  // Counter
  //=========================================================

  /** Tell the counter about an id handed out elsewhere. */
  public observe(namespace: string, value: number): void {
    this.registry.observe(namespace, value);
  }

  /** Value the next allocation will start from (before reconciliation). */
  public get next_id(): number {
    return this.registry.peek();
  }

  //=========================================================
  // References
  //=========================================================

  public define_reference(options: ReferenceOptions<E>): ReferenceField<E> {
    if (this.fields.has(options.key)) {
      throw new IDRefError(
        IDREF_ERROR.DUPLICATE_REFERENCE,
        `Reference "${options.key}" is already defined for ${this.kind}`,
        { key: options.key },
      );
    }
    const field = new ReferenceField(
      this.host,
      this.resolver,
      options.key + REFERENCE_KEY_SUFFIX,
      options,
    );
    this.fields.set(options.key, field);
    return field;
  }

  public get_reference(key: string): ReferenceField<E> | undefined {
    return this.fields.get(key);
  }
}
