/**
 * JSONC serialization with header, footer, section and carried comments.
 *
 * @packageDocumentation
 */

import type { ConfigMetadata } from '../config/types.js';
import type { CommentIndex, JsonObject, JsonValue } from './types.js';

const INDENT = '  ';

/**
 * Options for serializing a configuration.
 */
export interface SerializeOptions {
  /** Header, footer and section comments, and the banner switches. */
  metadata: Pick<
    ConfigMetadata,
    'headerComments' | 'footerComments' | 'sectionComments' | 'includeTimestamp' | 'includeVersion'
  >;
  /** Schema version written to the `Version:` line. */
  currentVersion: string;
  /** Comments carried over from the last parse. */
  comments?: CommentIndex | undefined;
  /** Clock for the `Last updated:` line (for testing). */
  now?: (() => Date) | undefined;
}

/**
 * Returns true for plain JSON objects (not arrays, not null).
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Converts a value to the JSON tree `JSON.stringify` would produce for it:
 * `undefined` members are dropped, `toJSON` is honoured, non-finite numbers
 * become null.
 *
 * @param value - Any object value.
 * @returns The canonical JSON object.
 * @throws TypeError if the value does not serialize to a JSON object.
 */
export function toJsonObject(value: unknown): JsonObject {
  const text: string | undefined = JSON.stringify(value);
  if (text === undefined) {
    throw new TypeError('Value is not JSON-serializable');
  }
  const tree: unknown = JSON.parse(text);
  if (!isJsonObject(tree)) {
    throw new TypeError('Value does not serialize to a JSON object');
  }
  return tree;
}

class JsoncWriter {
  private readonly sectionComments: Map<string, string>;
  private readonly comments: CommentIndex | undefined;

  constructor(sectionComments: Readonly<Record<string, string>>, comments?: CommentIndex) {
    this.sectionComments = new Map(Object.entries(sectionComments));
    this.comments = comments;
  }

  /**
   * Lines for the members of `obj` at indentation `depth`.
   */
  writeMembers(obj: JsonObject, path: string, depth: number, withComments: boolean): string[] {
    const indent = INDENT.repeat(depth);
    const entries = Object.entries(obj);
    const lines: string[] = [];

    entries.forEach(([key, value], index) => {
      const memberPath = path === '' ? key : `${path}.${key}`;

      if (withComments) {
        for (const comment of this.commentLines(memberPath)) {
          lines.push(`${indent}// ${comment}`.trimEnd());
        }
      }

      const valueLines = this.writeValue(value, memberPath, depth, withComments);
      const suffix = index < entries.length - 1 ? ',' : '';
      valueLines.forEach((line, lineIndex) => {
        const isFirst = lineIndex === 0;
        const isLast = lineIndex === valueLines.length - 1;
        const prefix = isFirst ? `${indent}${JSON.stringify(key)}: ` : '';
        lines.push(`${prefix}${line}${isLast ? suffix : ''}`);
      });
    });

    return lines;
  }

  /**
   * Lines for a value whose first line continues the line at indentation `depth`.
   */
  private writeValue(
    value: JsonValue,
    path: string,
    depth: number,
    withComments: boolean
  ): string[] {
    const closingIndent = INDENT.repeat(depth);

    if (Array.isArray(value)) {
      if (value.length === 0) {
        return ['[]'];
      }
      const elementIndent = INDENT.repeat(depth + 1);
      const lines = ['['];
      value.forEach((element, index) => {
        const elementLines = this.writeValue(element, path, depth + 1, false);
        const suffix = index < value.length - 1 ? ',' : '';
        elementLines.forEach((line, lineIndex) => {
          const prefix = lineIndex === 0 ? elementIndent : '';
          const isLast = lineIndex === elementLines.length - 1;
          lines.push(`${prefix}${line}${isLast ? suffix : ''}`);
        });
      });
      lines.push(`${closingIndent}]`);
      return lines;
    }

    if (isJsonObject(value)) {
      if (Object.keys(value).length === 0) {
        return ['{}'];
      }
      return ['{', ...this.writeMembers(value, path, depth + 1, withComments), `${closingIndent}}`];
    }

    return [JSON.stringify(value)];
  }

  /**
   * Section comment lines followed by carried comment lines, without repeating
   * a carried line that the section comment already supplies.
   */
  private commentLines(path: string): string[] {
    const section = this.sectionComments.get(path);
    const sectionLines = section === undefined ? [] : section.split('\n').map((l) => l.trim());
    const known = new Set(sectionLines);

    const carried = this.comments?.get(path);
    const carriedLines =
      carried === undefined
        ? []
        : carried
            .split('\n')
            .map((l) => l.trim())
            .filter((l) => l !== '' && !known.has(l));

    return [...sectionLines, ...carriedLines];
  }
}

/**
 * Serializes a configuration object to JSONC.
 *
 * Keys keep the object's own order, so the same value always produces the same
 * text (apart from the `Last updated:` line).
 *
 * @param config - The configuration object.
 * @param options - Comments and banner settings.
 * @returns The file content, ending with a newline.
 *
 * @example
 * ```typescript
 * const text = serializeJsonc(
 *   { version: '1.0', configId: 'main', port: 8080 },
 *   { metadata: resolveMetadata('main', { includeTimestamp: false }), currentVersion: '1.0' }
 * );
 * ```
 */
export function serializeJsonc(config: object, options: SerializeOptions): string {
  const { metadata, currentVersion } = options;
  const now = options.now ?? ((): Date => new Date());
  const tree = toJsonObject(config);
  const writer = new JsoncWriter(metadata.sectionComments, options.comments);

  const lines: string[] = ['/* CONFIG_SECTION'];
  for (const line of metadata.headerComments) {
    lines.push(` * ${line}`.trimEnd());
  }
  if (metadata.includeVersion) {
    lines.push(` * Version: ${currentVersion}`);
  }
  if (metadata.includeTimestamp) {
    lines.push(` * Last updated: ${now().toISOString()}`);
  }
  lines.push(' */');

  lines.push('{', ...writer.writeMembers(tree, '', 1, true), '}');

  lines.push('/*');
  for (const line of metadata.footerComments) {
    lines.push(` * ${line}`.trimEnd());
  }
  lines.push(' * END_CONFIG_SECTION', ' */');

  return lines.join('\n') + '\n';
}
