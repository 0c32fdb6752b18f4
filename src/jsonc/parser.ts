/**
 * JSONC parsing: payload and comment capture, and CONFIG_SECTION extraction.
 *
 * Tokenizing is left to `jsonc-parser`; this module only decides which `//`
 * comment belongs to which property and keys it by dotted path.
 *
 * @packageDocumentation
 */

import * as jsonc from 'jsonc-parser';
import type { CommentIndex, JsoncSyntaxError, ParsedJsonc } from './types.js';

const SECTION_START = /\bCONFIG_SECTION\b/;
const SECTION_END = /\bEND_CONFIG_SECTION\b/;

const PARSE_OPTIONS: jsonc.ParseOptions = {
  allowTrailingComma: true,
  allowEmptyContent: true,
};

type Container = 'object' | 'array';

/**
 * Dotted path of a property, or undefined when any enclosing container is an
 * array (comments are not tracked inside arrays).
 */
function toDottedPath(path: jsonc.JSONPath): string | undefined {
  const segments: string[] = [];
  for (const segment of path) {
    if (typeof segment !== 'string') {
      return undefined;
    }
    segments.push(segment);
  }
  return segments.join('.');
}

function appendComment(comments: CommentIndex, path: string, text: string): void {
  const existing = comments.get(path);
  comments.set(path, existing === undefined ? text : `${existing}\n${text}`);
}

function collectComments(content: string): CommentIndex {
  const comments: CommentIndex = new Map<string, string>();
  const containers: Container[] = [];
  let pending: string[] = [];

  // Last line holding a token, and the property key read on it, if any.
  let contentLine = -1;
  let lineKeyPath: string | undefined;

  const touch = (line: number): void => {
    if (line !== contentLine) {
      contentLine = line;
      lineKeyPath = undefined;
    }
  };
  const open =
    (kind: Container) =>
    (_offset: number, _length: number, startLine: number): void => {
      touch(startLine);
      containers.push(kind);
      pending = [];
    };
  const close = (_offset: number, _length: number, startLine: number): void => {
    touch(startLine);
    containers.pop();
    pending = [];
  };

  jsonc.visit(
    content,
    {
      onObjectBegin: open('object'),
      onArrayBegin: open('array'),
      onObjectEnd: close,
      onArrayEnd: close,
      onObjectProperty: (property, _offset, _length, startLine, _startCharacter, pathSupplier) => {
        touch(startLine);
        const path = toDottedPath([...pathSupplier(), property]);
        if (path !== undefined && pending.length > 0) {
          comments.set(path, pending.join('\n'));
        }
        pending = [];
        lineKeyPath = path;
      },
      onLiteralValue: (_value, _offset, _length, startLine) => touch(startLine),
      onSeparator: (_character, _offset, _length, startLine) => touch(startLine),
      onComment: (offset, length, startLine) => {
        const raw = content.slice(offset, offset + length);
        if (!raw.startsWith('//')) {
          return;
        }
        const text = raw.slice(2).trim();
        if (text === '') {
          return;
        }
        if (startLine === contentLine) {
          if (lineKeyPath !== undefined) {
            appendComment(comments, lineKeyPath, text);
          }
        } else if (containers[containers.length - 1] === 'object') {
          pending.push(text);
        }
      },
    },
    PARSE_OPTIONS
  );

  return comments;
}

/**
 * Parses JSONC text into a value and the comments it carried.
 *
 * Trailing commas are accepted. Comment capture rules:
 * - a `//` comment after a property key on the same line belongs to that key
 *   (for `"server": { // note` the key is `server`);
 * - `//` comments on their own lines belong to the next property key;
 * - comments inside arrays, before the root object, or on lines without a key
 *   are dropped;
 * - block comments are dropped.
 *
 * @param content - JSONC text.
 * @returns The parsed value (undefined when there are syntax errors or the
 *   text holds only comments and whitespace), the syntax errors and the
 *   comment index.
 *
 * @example
 * ```typescript
 * const { value, comments } = parseJsonc('{\n  // Port to bind\n  "port": 8080,\n}');
 * value; // { port: 8080 }
 * comments.get('port'); // 'Port to bind'
 * ```
 */
export function parseJsonc(content: string): ParsedJsonc {
  const parseErrors: jsonc.ParseError[] = [];
  const value: unknown = jsonc.parse(content, parseErrors, PARSE_OPTIONS);
  const errors: JsoncSyntaxError[] = parseErrors.map((error) => ({
    code: jsonc.printParseErrorCode(error.error),
    offset: error.offset,
    length: error.length,
  }));

  return {
    value: errors.length === 0 ? value : undefined,
    empty: errors.length === 0 && value === undefined,
    errors,
    comments: collectComments(content),
  };
}

/**
 * Extracts the machine-relevant part of a file written by the serializer: the
 * text after the block comment carrying the `CONFIG_SECTION` marker and before
 * the block comment carrying `END_CONFIG_SECTION` (or the end of the text).
 * Markers inside string values are not comments and are ignored.
 *
 * @param content - Full file content.
 * @returns The trimmed section text, or undefined when there is no start marker.
 */
export function extractSection(content: string): string | undefined {
  const bounds: { start?: number; end?: number } = {};

  jsonc.visit(
    content,
    {
      onComment: (offset, length) => {
        const text = content.slice(offset, offset + length);
        if (bounds.end !== undefined || !text.startsWith('/*')) {
          return;
        }
        if (bounds.start === undefined) {
          if (SECTION_START.test(text) && !SECTION_END.test(text)) {
            bounds.start = offset + length;
          }
        } else if (SECTION_END.test(text)) {
          bounds.end = offset;
        }
      },
    },
    PARSE_OPTIONS
  );

  return bounds.start === undefined
    ? undefined
    : content.slice(bounds.start, bounds.end).trim();
}

/**
 * Parses a config file: its CONFIG_SECTION when it has one, the whole text
 * otherwise.
 *
 * @param content - Full file content.
 */
export function parseConfigText(content: string): ParsedJsonc {
  return parseJsonc(extractSection(content) ?? content);
}
