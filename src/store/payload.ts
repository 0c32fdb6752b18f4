/**
 * Turning parsed JSON into typed configuration payloads, and content hashing.
 *
 * The compiled-in default config doubles as the schema: a payload read from
 * disk takes the default's top-level keys, in the default's order, and each
 * value must have the same JSON kind as the default's value for that key.
 * An optional JSON Schema adds finer checks on top.
 *
 * @packageDocumentation
 */

import { createHash } from 'node:crypto';
import Ajv from 'ajv';
import type { ErrorObject } from 'ajv';
import { parseConfigText } from '../jsonc/parser.js';
import { isJsonObject, toJsonObject } from '../jsonc/serializer.js';
import type { JsonObject, JsonValue, ParsedJsonc } from '../jsonc/types.js';
import type { Logger } from '../utils/logger.js';
import { ConfigLoadError } from './errors.js';

/**
 * The fields every configuration payload carries.
 */
export interface ConfigPayload {
  /** Schema version the payload was written under. */
  version: string;
  /** Stable identifier, used for the file and directory names. */
  configId: string;
}

/**
 * JSON kind of a value.
 */
export type JsonKind = 'string' | 'number' | 'boolean' | 'null' | 'array' | 'object';

/**
 * A JSON Schema document, as accepted by Ajv.
 */
export type JsonSchema = Record<string, unknown>;

interface SchemaValidator {
  (data: unknown): boolean;
  errors?: ErrorObject[] | null;
}

/**
 * Returns the JSON kind of a value.
 */
export function kindOf(value: JsonValue): JsonKind {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'number':
      return 'number';
    case 'boolean':
      return 'boolean';
    default:
      return 'object';
  }
}

/**
 * Whether `value` may stand in for `template`: same JSON kind, or any kind
 * where the template is null.
 */
export function isKindCompatible(template: JsonValue, value: JsonValue): boolean {
  return template === null || kindOf(template) === kindOf(value);
}

/**
 * SHA-256 of the canonical JSON text of a payload. Equal for structurally
 * equal payloads with the same key order.
 *
 * @param config - Payload to hash.
 * @returns Hex digest.
 */
export function hashConfig(config: object): string {
  return createHash('sha256').update(JSON.stringify(config), 'utf8').digest('hex');
}

/**
 * Deep copy of a payload.
 */
export function cloneConfig<T extends ConfigPayload>(config: T): T {
  return structuredClone(config);
}

function conformsTo<T extends ConfigPayload>(
  value: JsonObject,
  template: JsonObject
): value is JsonObject & T {
  return (
    typeof value.version === 'string' &&
    typeof value.configId === 'string' &&
    Object.entries(template).every(([key, templateValue]) => {
      const candidate = value[key];
      return candidate !== undefined && isKindCompatible(templateValue, candidate);
    })
  );
}

/**
 * Options for a PayloadDecoder.
 */
export interface PayloadDecoderOptions<T extends ConfigPayload> {
  /** Compiled-in default, used as the shape template and for missing keys. */
  defaultConfig: T;
  /** Optional JSON Schema every decoded payload must satisfy. */
  schema?: JsonSchema | undefined;
  /** Logger for dropped keys. */
  logger: Logger;
}

/**
 * Decodes parsed JSON into payloads shaped like the default config.
 */
export class PayloadDecoder<T extends ConfigPayload> {
  private readonly template: JsonObject;
  private readonly validateSchema: SchemaValidator | undefined;
  private readonly logger: Logger;

  constructor(options: PayloadDecoderOptions<T>) {
    this.template = toJsonObject(options.defaultConfig);
    this.logger = options.logger;

    if (options.schema !== undefined) {
      // ajv is CommonJS; under NodeNext its default import is typed as the module namespace.
      const ajv = new (Ajv as unknown as new (opts: { allErrors: boolean }) => {
        compile: (schema: JsonSchema) => SchemaValidator;
      })({ allErrors: true });
      this.validateSchema = ajv.compile(options.schema);
    }
  }

  /**
   * The default config as a JSON tree; the shape every payload is decoded into.
   */
  get shape(): Readonly<JsonObject> {
    return this.template;
  }

  /**
   * Checks parsed JSONC for an object carrying string `version` and
   * `configId` fields, without checking the remaining fields.
   *
   * @param parsed - Output of the JSONC parser.
   * @returns The parsed object.
   * @throws ConfigLoadError `empty_file` when nothing but comments remained,
   *   `json_error` for syntax errors, `parse_error` for anything but an
   *   object with string `version` and `configId`.
   */
  parseEnvelope(parsed: ParsedJsonc): JsonObject {
    if (parsed.empty) {
      throw new ConfigLoadError('Config content is empty', 'empty_file', {
        details: 'Nothing remains after removing comments',
      });
    }

    const [firstError] = parsed.errors;
    if (firstError !== undefined) {
      throw new ConfigLoadError(
        `Malformed JSON: ${firstError.code} at offset ${firstError.offset}`,
        'json_error',
        { details: parsed.errors.map((e) => `${e.code}@${e.offset}`).join(', ') }
      );
    }

    const { value } = parsed;
    if (!isJsonObject(value)) {
      throw new ConfigLoadError('Invalid config format: expected an object', 'parse_error', {
        details: `Received ${value === null ? 'null' : Array.isArray(value) ? 'array' : typeof value}`,
      });
    }

    if (typeof value.version !== 'string' || typeof value.configId !== 'string') {
      throw new ConfigLoadError(
        'Invalid config format: "version" and "configId" must be strings',
        'parse_error'
      );
    }

    return value;
  }

  /**
   * Decodes a parsed object into a payload.
   *
   * Keys follow the default's order. Missing keys take the default's value;
   * keys the default does not have are dropped.
   *
   * @param tree - Parsed JSON object.
   * @returns The payload.
   * @throws ConfigLoadError `parse_error` when a value has the wrong kind or
   *   the JSON Schema rejects the payload.
   */
  decode(tree: JsonObject): T {
    const result: JsonObject = {};

    for (const [key, templateValue] of Object.entries(this.template)) {
      const value = Object.hasOwn(tree, key) ? tree[key] : undefined;
      if (value === undefined) {
        result[key] = structuredClone(templateValue);
        continue;
      }
      if (!isKindCompatible(templateValue, value)) {
        throw new ConfigLoadError(
          `Invalid type for '${key}': expected ${kindOf(templateValue)}, got ${kindOf(value)}`,
          'parse_error'
        );
      }
      result[key] = value;
    }

    const dropped = Object.keys(tree).filter((key) => !Object.hasOwn(this.template, key));
    if (dropped.length > 0) {
      this.logger.debug('unknown_fields_dropped', { fields: dropped });
    }

    if (this.validateSchema !== undefined && !this.validateSchema(result)) {
      const messages =
        this.validateSchema.errors?.map(
          (e: ErrorObject) => `${e.instancePath}: ${e.message ?? 'Unknown error'}`
        ) ?? [];
      throw new ConfigLoadError('Config does not match its JSON Schema', 'parse_error', {
        details: messages.join('; '),
      });
    }

    if (!conformsTo<T>(result, this.template)) {
      throw new ConfigLoadError('Invalid config format: required fields missing', 'parse_error');
    }

    return result;
  }

  /**
   * Parses and decodes config file text in one step.
   *
   * @param content - File content, with or without CONFIG_SECTION markers.
   * @returns The payload.
   * @throws ConfigLoadError as {@link parseEnvelope} and {@link decode} do.
   */
  decodeText(content: string): T {
    return this.decode(this.parseEnvelope(parseConfigText(content)));
  }
}
