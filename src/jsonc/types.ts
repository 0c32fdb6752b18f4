/**
 * Type definitions for JSON values and the JSONC comment layer.
 *
 * @packageDocumentation
 */

/**
 * A JSON scalar.
 */
export type JsonPrimitive = string | number | boolean | null;

/**
 * A JSON array.
 */
export type JsonArray = JsonValue[];

/**
 * A JSON object.
 */
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Any value JSON can represent.
 */
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

/**
 * Comments carried between parse and serialize, keyed by dotted property path
 * (e.g. `"server.port"`). Multi-line comments are joined with `\n`.
 */
export type CommentIndex = Map<string, string>;

/**
 * A syntax error reported by the JSONC parser.
 */
export interface JsoncSyntaxError {
  /** Error code name, e.g. `PropertyNameExpected`. */
  code: string;
  offset: number;
  length: number;
}

/**
 * Result of parsing JSONC text.
 */
export interface ParsedJsonc {
  /** The parsed value; undefined when there are errors or nothing to parse. */
  value: unknown;
  /** True when the input held nothing but comments and whitespace. */
  empty: boolean;
  errors: JsoncSyntaxError[];
  /** Line comments recovered from the input. */
  comments: CommentIndex;
}
