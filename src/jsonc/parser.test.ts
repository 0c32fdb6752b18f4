import { describe, expect, it } from 'vitest';
import { extractSection, parseConfigText, parseJsonc } from './index.js';

describe('JSONC parser', () => {
  describe('parseJsonc', () => {
    it('should parse through comments and trailing commas', () => {
      const content = [
        '{',
        '  // Leading comment',
        '  "a": 1, // trailing a',
        '  "b": "http://example.com/*not-a-comment*/",',
        '  "obj": { // about obj',
        '    // inner',
        '    "x": [1, 2,],',
        '  },',
        '}',
      ].join('\n');

      const { value, errors } = parseJsonc(content);

      expect(errors).toEqual([]);
      expect(value).toEqual({
        a: 1,
        b: 'http://example.com/*not-a-comment*/',
        obj: { x: [1, 2] },
      });
    });

    it('should key comments by dotted property path', () => {
      const content = [
        '{',
        '  // Leading comment',
        '  "a": 1, // trailing a',
        '  "obj": { // about obj',
        '    // inner',
        '    "x": true',
        '  }',
        '}',
      ].join('\n');

      const { comments } = parseJsonc(content);

      expect(Object.fromEntries(comments)).toEqual({
        a: 'Leading comment\ntrailing a',
        obj: 'about obj',
        'obj.x': 'inner',
      });
    });

    it('should join consecutive own-line comments for the next key', () => {
      const content = '{\n  // first\n  // second\n  "port": 8080\n}';

      expect(parseJsonc(content).comments.get('port')).toBe('first\nsecond');
    });

    it('should report empty input when only comments remain', () => {
      const { value, empty, errors, comments } = parseJsonc('/* only a block */\n// and a line\n   \n');

      expect(value).toBeUndefined();
      expect(empty).toBe(true);
      expect(errors).toEqual([]);
      expect(comments.size).toBe(0);
    });

    it('should drop comments inside arrays and before the root object', () => {
      const content = '// top of file\n{\n  "list": [\n    // in array\n    1\n  ]\n}';

      const { value, comments } = parseJsonc(content);

      expect(value).toEqual({ list: [1] });
      expect(comments.size).toBe(0);
    });

    it('should drop a trailing comment on a line without a key', () => {
      const content = '{\n  "a": {\n    "b": 1\n  }, // closing\n  "c": 2\n}';

      expect(parseJsonc(content).comments.size).toBe(0);
    });

    it('should leave comment markers inside escaped strings alone', () => {
      const { value, comments } = parseJsonc('{ "a": "say \\"hi\\" // not a comment" }');

      expect(value).toEqual({ a: 'say "hi" // not a comment' });
      expect(comments.size).toBe(0);
    });

    it('should decode escaped keys before recording comments', () => {
      const { comments } = parseJsonc('{\n  // c\n  "we\\u0069rd": 1\n}');

      expect(comments.get('weird')).toBe('c');
    });

    it('should keep tokens separated where a block comment sat between them', () => {
      expect(parseJsonc('{"a": 1/* c */}').value).toEqual({ a: 1 });
      expect(parseJsonc('[1/* c */2]').errors.map((e) => e.code)).toEqual(['CommaExpected']);
    });

    it('should accept trailing commas but not commas inside strings as structure', () => {
      expect(parseJsonc('[1, 2, ]').value).toEqual([1, 2]);
      expect(parseJsonc('{"a": ",}",\n}').value).toEqual({ a: ',}' });
    });

    it('should report malformed input with error codes and no value', () => {
      const { value, empty, errors } = parseJsonc('{ invalid json }');

      expect(value).toBeUndefined();
      expect(empty).toBe(false);
      expect(errors[0]).toEqual({ code: 'InvalidSymbol', offset: 2, length: 7 });
    });
  });

  describe('extractSection', () => {
    it('should return the text between the markers', () => {
      const content = '/* CONFIG_SECTION */\n{"a": 1}\n/* END_CONFIG_SECTION */';

      expect(extractSection(content)).toBe('{"a": 1}');
    });

    it('should run to the end of the text without an end marker', () => {
      expect(extractSection('/* CONFIG_SECTION\n * header\n */ {"a": 1}\n')).toBe('{"a": 1}');
    });

    it('should ignore comment markers inside string values', () => {
      const content = [
        '/* CONFIG_SECTION */',
        '{ "logGlob": "logs/*.log", "note": "see END_CONFIG_SECTION */ here" }',
        '/* END_CONFIG_SECTION */',
      ].join('\n');

      expect(extractSection(content)).toBe(
        '{ "logGlob": "logs/*.log", "note": "see END_CONFIG_SECTION */ here" }'
      );
    });

    it('should return undefined without a start marker', () => {
      expect(extractSection('{"a": 1}')).toBeUndefined();
      expect(extractSection('/* END_CONFIG_SECTION */')).toBeUndefined();
    });
  });

  describe('parseConfigText', () => {
    it('should parse the section when there is one and the whole text otherwise', () => {
      const sectioned = '/* CONFIG_SECTION */\n{"a": "x/*y"}\n/* END_CONFIG_SECTION */\n// footer';

      expect(parseConfigText(sectioned).value).toEqual({ a: 'x/*y' });
      expect(parseConfigText('// hand written\n{"a": 1,}').value).toEqual({ a: 1 });
    });
  });
});
