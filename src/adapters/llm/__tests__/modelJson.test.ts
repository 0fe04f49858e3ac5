import { describe, it, expect } from 'vitest';
import { extractFirstJsonObject, safeParseModelJSON, stripFences } from '../modelJson';

describe('safeParseModelJSON', () => {
  it('should parse plain JSON', () => {
    expect(safeParseModelJSON('{"overall_score": 8.2}')).toEqual({ overall_score: 8.2 });
  });

  it('should parse JSON inside Markdown fences', () => {
    expect(safeParseModelJSON('```json\n{"a": [1, 2]}\n```')).toEqual({ a: [1, 2] });
  });

  it('should extract the first object from surrounding prose', () => {
    expect(safeParseModelJSON('Here is my review: {"note": "a } inside"} thanks')).toEqual({ note: 'a } inside' });
  });

  it('should return null for empty or unreadable text', () => {
    expect(safeParseModelJSON('')).toBeNull();
    expect(safeParseModelJSON('no json here')).toBeNull();
    expect(safeParseModelJSON('{"broken": ')).toBeNull();
  });
});

describe('stripFences', () => {
  it('should remove opening and closing fences', () => {
    expect(stripFences('```\n{"x":1}\n```')).toBe('{"x":1}\n');
  });
});

describe('extractFirstJsonObject', () => {
  it('should balance nested braces and escaped quotes', () => {
    expect(extractFirstJsonObject('x {"a": {"b": "q\\"}"}} y')).toBe('{"a": {"b": "q\\"}"}}');
  });

  it('should return null without an opening brace', () => {
    expect(extractFirstJsonObject('[]')).toBeNull();
  });
});
