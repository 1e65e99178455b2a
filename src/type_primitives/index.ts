export type { Brand } from "./brand";
export { validate_and_cast, is_positive_safe_integer } from "./assertions";
export { TypeError, TYPE_ERROR } from "./error";
