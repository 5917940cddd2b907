import { decode, isJsonContentType, MalformedPayloadError, PayloadKind } from '../../src';

describe('Payload Decoder', () => {
  const jsonHeaders = { 'content-type': 'application/json' };

  describe('isJsonContentType', () => {
    it('should match application/json regardless of case and parameters', () => {
      expect(isJsonContentType('application/json')).toBe(true);
      expect(isJsonContentType('Application/JSON; charset=utf-8')).toBe(true);
    });

    it('should reject other or missing content types', () => {
      expect(isJsonContentType('text/plain')).toBe(false);
      expect(isJsonContentType(undefined)).toBe(false);
    });
  });

  describe('JSON bodies', () => {
    it('should parse an object body', () => {
      const payload = decode(jsonHeaders, Buffer.from('{"event":"test","count":2}'));

      expect(payload).toEqual({
        kind: PayloadKind.JSON,
        value: { event: 'test', count: 2 },
        text: '{"event":"test","count":2}',
      });
    });

    it('should parse scalar and array bodies', () => {
      expect(decode(jsonHeaders, Buffer.from('[1,2,3]'))).toEqual({
        kind: PayloadKind.JSON,
        value: [1, 2, 3],
        text: '[1,2,3]',
      });
      expect(decode(jsonHeaders, Buffer.from('null'))).toEqual({
        kind: PayloadKind.JSON,
        value: null,
        text: 'null',
      });
    });

    it('should strip a leading byte order mark', () => {
      const payload = decode(jsonHeaders, Buffer.from('\uFEFF{"a":1}', 'utf8'));

      expect(payload).toEqual({ kind: PayloadKind.JSON, value: { a: 1 }, text: '{"a":1}' });
    });

    it('should keep the body text of deeply nested documents', () => {
      const depth = 100000;
      const text = '['.repeat(depth) + ']'.repeat(depth);

      const payload = decode(jsonHeaders, Buffer.from(text));

      expect(payload.kind === PayloadKind.JSON && Array.isArray(payload.value)).toBe(true);
      expect(payload.text).toBe(text);
    });

    it('should throw MalformedPayloadError for invalid JSON', () => {
      expect(() => decode(jsonHeaders, Buffer.from('invalid json data'))).toThrow(
        MalformedPayloadError,
      );
    });

    it('should throw MalformedPayloadError for an empty body', () => {
      expect(() => decode(jsonHeaders, Buffer.alloc(0))).toThrow('Request body is empty');
    });

    it('should ignore form fields for JSON bodies', () => {
      const payload = decode(jsonHeaders, Buffer.from('{}'), { a: '1' });

      expect(payload).toEqual({ kind: PayloadKind.JSON, value: {}, text: '{}' });
    });
  });

  describe('raw bodies', () => {
    it('should return raw text for non-JSON content types', () => {
      const payload = decode({ 'content-type': 'text/plain' }, Buffer.from('hello'));

      expect(payload).toEqual({ kind: PayloadKind.RAW, text: 'hello' });
    });

    it('should treat a missing content type as raw', () => {
      const payload = decode({}, Buffer.from('{"looks":"like json"}'));

      expect(payload).toEqual({ kind: PayloadKind.RAW, text: '{"looks":"like json"}' });
    });

    it('should return empty text for an empty raw body', () => {
      expect(decode({ 'content-type': 'text/plain' }, Buffer.alloc(0))).toEqual({
        kind: PayloadKind.RAW,
        text: '',
      });
    });

    it('should replace invalid UTF-8 sequences', () => {
      const payload = decode({}, Buffer.from([0x61, 0xff, 0x62]));

      expect(payload).toEqual({ kind: PayloadKind.RAW, text: 'a\uFFFDb' });
    });

    it('should carry form fields when given', () => {
      const payload = decode(
        { 'content-type': 'application/x-www-form-urlencoded' },
        Buffer.from('a=1'),
        { a: '1' },
      );

      expect(payload).toEqual({ kind: PayloadKind.RAW, text: 'a=1', formFields: { a: '1' } });
    });

    it('should be deterministic for identical input', () => {
      const body = Buffer.from('{"x":[1,{"y":true}]}');

      expect(decode(jsonHeaders, body)).toEqual(decode(jsonHeaders, body));
    });
  });
});
