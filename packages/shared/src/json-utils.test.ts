import { findBalancedObject, tryParseJson, isPlainObject } from './json-utils';

describe('findBalancedObject', () => {
  it('returns null when there is no opening brace', () => {
    expect(findBalancedObject('plain text')).toBeNull();
  });

  it('returns null when depth never returns to zero', () => {
    expect(findBalancedObject('{"a": {"b": 1}')).toBeNull();
  });

  it('stops at the brace that closes the first object', () => {
    const text = 'Here you go: {"a": {"b": 1}} and then {"c": 2}';
    const span = findBalancedObject(text);
    expect(span?.text).toBe('{"a": {"b": 1}}');
    expect(span?.start).toBe(13);
    expect(span?.end).toBe(28);
  });

  it('ignores braces inside string literals', () => {
    const span = findBalancedObject('{"code": "function f() { return 1; }"} trailing }');
    expect(span?.text).toBe('{"code": "function f() { return 1; }"}');
  });

  it('does not toggle string state on an escaped quote', () => {
    const text = '{"a": "say \\"}\\" twice"} rest {';
    expect(findBalancedObject(text)?.text).toBe('{"a": "say \\"}\\" twice"}');
  });

  it('treats an escaped backslash before a quote as closing the string', () => {
    const text = '{"path": "C:\\\\"} tail';
    expect(findBalancedObject(text)?.text).toBe('{"path": "C:\\\\"}');
  });

  it('can start scanning from an offset', () => {
    expect(findBalancedObject('{"a":1} {"b":2}', 1)?.text).toBe('{"b":2}');
  });
});

describe('tryParseJson', () => {
  it('returns the parsed value', () => {
    expect(tryParseJson('[1,2]')).toEqual({ ok: true, value: [1, 2] });
  });

  it('returns the error message on failure', () => {
    const result = tryParseJson('{');
    expect(result.ok).toBe(false);
  });
});

describe('isPlainObject', () => {
  it('accepts objects and rejects arrays and null', () => {
    expect(isPlainObject({})).toBe(true);
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(null)).toBe(false);
  });
});
