/**
 * JSON-with-comments codec for configuration files.
 *
 * @packageDocumentation
 */

export { extractSection, parseConfigText, parseJsonc } from './parser.js';
export { isJsonObject, serializeJsonc, toJsonObject } from './serializer.js';
export type { SerializeOptions } from './serializer.js';
export type {
  CommentIndex,
  JsonArray,
  JsonObject,
  JsonPrimitive,
  JsonValue,
  JsoncSyntaxError,
  ParsedJsonc,
} from './types.js';
