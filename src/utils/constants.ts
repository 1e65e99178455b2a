// Stored id value meaning "no id yet" / "no reference"
export const UNSET_ID = 0;

// First value a fresh CounterState hands out
export const FIRST_ID = 1;

// Width of the id range reserved for each linked library. A library entity's
// effective id is raw + (library_index + 1) * DEFAULT_LIBRARY_ID_SPACE.
export const DEFAULT_LIBRARY_ID_SPACE = 10_000_000;

// Suffix of the owner slot holding a reference field's target id
export const REFERENCE_KEY_SUFFIX = "_id";

// IDRef defaults
export const DEFAULT_KIND = "objects";
export const DEFAULT_LOG_LEVEL = "warn";
