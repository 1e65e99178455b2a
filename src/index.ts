// Facade
export { IDRef, type IDRefOptions } from "./idref";

// Host boundary
export type { IDRefHost, Namespace } from "./host";

// Ids
export { as_unique_id, type UniqueID } from "./unique_id";

// Counter
export { CounterState } from "./counter/counter_state";
export { CounterRegistry } from "./counter/counter_registry";

// Resolver
export {
  IdentityResolver,
  type RepairReport,
} from "./identity/identity_resolver";

// References
export {
  ReferenceField,
  type ReferenceOptions,
  type ReferenceValidator,
  type PickerModel,
} from "./reference/reference_field";

// Errors
export {
  AppError,
  IDRefError,
  IDREF_ERROR,
  ValidationError,
  is_idref_error,
} from "./utils/error";

// Logging
export {
  create_console_logger,
  silent_logger,
  type Logger,
  type LogLevel,
  type LogPayload,
} from "./utils/logger";
