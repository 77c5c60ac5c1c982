/**
 * Tests for core XML parser utilities
 */

import { describe, it, expect } from 'vitest';
import {
  buildXml,
  childElements,
  childText,
  childValue,
  cleanETag,
  parseDateSafe,
  parseIntSafe,
  parseXml,
  type XmlElement,
} from '../parser.js';

describe('XML parser', () => {
  it('parses nested elements as strings', () => {
    const parsed = parseXml('<Root><Count>42</Count><Flag>true</Flag></Root>');

    expect(parsed).toEqual({ Root: { Count: '42', Flag: 'true' } });
  });

  it('reports malformed documents with their line', () => {
    expect(() => parseXml('<Root>\n<Open></Root>')).toThrow(/^Malformed XML at line 2:/);
  });

  it('builds documents with a declaration', () => {
    expect(buildXml({ Root: { Value: 'a & b' } })).toBe(
      '<?xml version="1.0" encoding="UTF-8"?><Root><Value>a &amp; b</Value></Root>'
    );
  });

  it('normalizes single and repeated children to arrays', () => {
    const single = parseXml('<R><Item><Name>a</Name></Item></R>');
    const repeated = parseXml('<R><Item><Name>a</Name></Item><Item><Name>b</Name></Item></R>');
    const root = (value: XmlElement): XmlElement => {
      const r = value['R'];
      return typeof r === 'object' && !Array.isArray(r) ? r : {};
    };

    expect(childElements(root(single), 'Item').map((item) => childText(item, 'Name'))).toEqual(['a']);
    expect(childElements(root(repeated), 'Item').map((item) => childText(item, 'Name'))).toEqual(['a', 'b']);
    expect(childElements(root(single), 'Missing')).toEqual([]);
  });

  it('reads empty elements as empty text', () => {
    const parsed = parseXml('<R><Prefix></Prefix><Other/></R>');
    const root = parsed['R'];
    if (typeof root !== 'object' || Array.isArray(root)) throw new Error('unexpected shape');

    expect(childText(root, 'Prefix')).toBe('');
    expect(childText(root, 'Other')).toBe('');
    expect(childText(root, 'Absent')).toBeUndefined();
  });

  it('keeps surrounding whitespace in text unless asked to trim', () => {
    const parsed = parseXml('<R>\n  <Key> padded </Key>\n  <Size> 12 </Size>\n</R>');
    const root = parsed['R'];
    if (typeof root !== 'object' || Array.isArray(root)) throw new Error('unexpected shape');

    expect(childText(root, 'Key')).toBe(' padded ');
    expect(childValue(root, 'Size')).toBe('12');
    expect(childValue(root, 'Absent')).toBeUndefined();
  });

  it('cleans ETags', () => {
    expect(cleanETag('"abc123"')).toBe('abc123');
    expect(cleanETag('abc123')).toBe('abc123');
  });

  it('parses numbers and dates defensively', () => {
    expect(parseIntSafe('12', 0)).toBe(12);
    expect(parseIntSafe('x', 7)).toBe(7);
    expect(parseIntSafe(undefined, 3)).toBe(3);
    expect(parseDateSafe('2024-01-15T10:30:00.000Z')).toEqual(new Date('2024-01-15T10:30:00.000Z'));
    expect(parseDateSafe('not a date')).toBeUndefined();
  });
});
