import { describe, it, expect } from 'vitest';
import {
  parseStyle,
  readStyle,
  serializeStyle,
  setStyleValues,
  styleFromRecord,
  joinStyleText,
  isStyleFlagSet,
  getStyleValue,
  styleToRecord,
  StyleRegistry,
  withStyleFlag,
} from '../style.js';
import { MalformedStyleError } from '../errors.js';

describe('parseStyle', () => {
  it('should type numbers, strings and bare flags', () => {
    const style = parseStyle('ellipse;rounded=1;fillColor=#dae8fc;opacity=.5;');
    expect(style.entries).toEqual([
      { key: 'ellipse', value: true },
      { key: 'rounded', value: 1 },
      { key: 'fillColor', value: '#dae8fc' },
      { key: 'opacity', value: 0.5 },
    ]);
    expect(style.opaque).toBe(false);
  });

  it('should keep non-decimal numerals as strings', () => {
    const style = parseStyle('size=1e3;dx=-2.5');
    expect(getStyleValue(style, 'size')).toBe('1e3');
    expect(getStyleValue(style, 'dx')).toBe(-2.5);
  });

  it('should split at the first equals sign', () => {
    const style = parseStyle('image=data:image/png,a=b');
    expect(getStyleValue(style, 'image')).toBe('data:image/png,a=b');
  });

  it('should take the last value of a duplicated key at its first position', () => {
    const style = parseStyle('a=1;b=2;a=3');
    expect(style.entries).toEqual([
      { key: 'a', value: 3 },
      { key: 'b', value: 2 },
    ]);
  });

  it('should reject empty and invalid keys', () => {
    expect(() => parseStyle('=red')).toThrow(MalformedStyleError);
    expect(() => parseStyle('fill color=red')).toThrow(MalformedStyleError);
    try {
      parseStyle('a=1;"b"=2');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedStyleError);
      if (err instanceof MalformedStyleError) {
        expect(err.kind).toBe('MalformedStyle');
        expect(err.raw).toBe('a=1;"b"=2');
      }
    }
  });

  it('should serialize back to the exact source text', () => {
    const sources = ['', 'rounded', 'rounded;', ';;a=1;;', 'a=1;a=2', 'shape=mxgraph.flowchart.process;html=1;whiteSpace=wrap;'];
    for (const source of sources) {
      expect(serializeStyle(parseStyle(source))).toBe(source);
    }
  });
});

describe('readStyle', () => {
  it('should keep unparseable text as an opaque style', () => {
    const style = readStyle('bad key=1;x=2');
    expect(style).toEqual({ text: 'bad key=1;x=2', entries: [], opaque: true });
    expect(serializeStyle(style)).toBe('bad key=1;x=2');
  });

  it('should refuse to modify an opaque style', () => {
    expect(() => setStyleValues(readStyle('bad key'), { a: 1 })).toThrow(MalformedStyleError);
  });
});

describe('setStyleValues', () => {
  it('should keep the source text of keys it does not touch', () => {
    const style = setStyleValues(parseStyle('zip=01234;ratio=1.50;fillColor=red;'), { fillColor: 'blue' });
    expect(style.text).toBe('zip=01234;ratio=1.50;fillColor=blue;');
  });

  it('should collapse a duplicated key to its last segment', () => {
    expect(setStyleValues(parseStyle('a=01;b=2;a=03'), { c: 1 }).text).toBe('a=03;b=2;c=1');
  });

  it('should update in place and append new keys', () => {
    const style = setStyleValues(parseStyle('rounded=0;whiteSpace=wrap;html=1;'), { rounded: 1, fillColor: '#dae8fc' });
    expect(style.text).toBe('rounded=1;whiteSpace=wrap;html=1;fillColor=#dae8fc;');
    expect(getStyleValue(style, 'rounded')).toBe(1);
  });

  it('should remove keys set to null', () => {
    expect(setStyleValues(parseStyle('a=1;html=1'), { html: null }).text).toBe('a=1');
    expect(setStyleValues(parseStyle('a=1;'), { a: null }).text).toBe('');
  });

  it('should write true as a bare flag and false as 0', () => {
    expect(setStyleValues(parseStyle(''), { dashed: true }).text).toBe('dashed;');
    expect(setStyleValues(parseStyle('x=1'), { dashed: false }).text).toBe('x=1;dashed=0');
  });

  it('should keep entries consistent with the text', () => {
    const style = setStyleValues(parseStyle('a=1'), { b: 'x' });
    expect(style).toEqual(parseStyle(style.text));
  });

  it('should reject delimiters in keys and values', () => {
    expect(() => setStyleValues(parseStyle(''), { 'a=b': 1 })).toThrow(MalformedStyleError);
    expect(() => setStyleValues(parseStyle(''), { a: 'x;y' })).toThrow(MalformedStyleError);
  });
});

describe('style helpers', () => {
  it('should read draw.io flags', () => {
    expect(isStyleFlagSet(parseStyle('locked'), 'locked')).toBe(true);
    expect(isStyleFlagSet(parseStyle('locked=1'), 'locked')).toBe(true);
    expect(isStyleFlagSet(parseStyle('locked=true'), 'locked')).toBe(true);
    expect(isStyleFlagSet(parseStyle('locked=0'), 'locked')).toBe(false);
    expect(isStyleFlagSet(parseStyle(''), 'locked')).toBe(false);
  });

  it('should build a style from a record', () => {
    expect(styleFromRecord({ a: 1, b: 'x' }).text).toBe('a=1;b=x;');
    expect(styleToRecord(parseStyle('a=1;b=x;c'))).toEqual({ a: 1, b: 'x', c: true });
  });

  it('should join style fragments', () => {
    expect(joinStyleText('a=1', 'b=2;', '', 'c')).toBe('a=1;b=2;c');
    expect(joinStyleText('', 'x=1')).toBe('x=1');
  });
});

describe('StyleRegistry', () => {
  it('should expand named base styles under inline values', () => {
    const registry = new StyleRegistry();
    registry.register('base', 'fillColor=red;strokeColor=blue');
    expect(registry.resolve(parseStyle('base;fillColor=green'))).toEqual({
      base: true,
      fillColor: 'green',
      strokeColor: 'blue',
    });
  });

  it('should stop at cycles between named styles', () => {
    const registry = new StyleRegistry();
    registry.register('a', 'b;x=1');
    registry.register('b', 'a;y=2');
    expect(registry.resolve(parseStyle('a'))).toEqual({ a: true, b: true, x: 1, y: 2 });
  });

  it('should list registered names', () => {
    const registry = new StyleRegistry();
    registry.register('one', 'a=1');
    expect(registry.has('one')).toBe(true);
    expect(registry.has('two')).toBe(false);
    expect(registry.names()).toEqual(['one']);
    expect(registry.get('one')?.text).toBe('a=1');
  });
});

describe('withStyleFlag', () => {
  it('should prepend a missing flag', () => {
    expect(withStyleFlag(parseStyle('fillColor=none;'), 'group').text).toBe('group;fillColor=none;');
    expect(withStyleFlag(parseStyle(''), 'group').text).toBe('group;');
  });

  it('should set a flag written with a false value in place', () => {
    expect(withStyleFlag(parseStyle('a=1;group=0'), 'group').text).toBe('a=1;group');
  });

  it('should return set flags and opaque styles unchanged', () => {
    const flagged = parseStyle('group;');
    expect(withStyleFlag(flagged, 'group')).toBe(flagged);
    const opaque = readStyle('bad key');
    expect(withStyleFlag(opaque, 'group')).toBe(opaque);
  });
});
