import { MalformedStyleError } from './errors.js';

/**
 * draw.io style strings: `key=value` pairs and bare flags separated by `;`.
 *
 * A `Style` keeps the exact text it was read from. `entries` is always what
 * `parseStyle(text)` yields, so two styles with the same text are equal and an
 * unmutated style serializes back to its source byte for byte.
 */

export type StyleValue = string | number | boolean;

export interface StyleEntry {
  readonly key: string;
  readonly value: StyleValue;
}

export interface Style {
  readonly text: string;
  /** Unique keys in first-occurrence order, each holding its last value */
  readonly entries: readonly StyleEntry[];
  /** Unparseable source kept verbatim; cannot be mutated */
  readonly opaque: boolean;
}

/** Partial update: `null` removes a key */
export type StylePatch = Record<string, StyleValue | null>;

const NUMBER_PATTERN = /^-?(?:\d+\.?\d*|\.\d+)$/;
const INVALID_KEY = /[\s=;"'<>]/;

export const EMPTY_STYLE: Style = { text: '', entries: [], opaque: false };

/** Parse a style string, throwing `MalformedStyleError` on an invalid key */
export function parseStyle(text: string): Style {
  const order: string[] = [];
  const values = new Map<string, StyleValue>();

  for (const segment of text.split(';')) {
    if (segment === '') continue;
    const eq = segment.indexOf('=');
    const key = eq === -1 ? segment : segment.slice(0, eq);
    if (key === '' || INVALID_KEY.test(key)) {
      throw new MalformedStyleError(`Malformed style key "${key}" in "${text}"`, text);
    }
    const value = eq === -1 ? true : typedValue(segment.slice(eq + 1));
    if (!values.has(key)) order.push(key);
    values.set(key, value);
  }

  const entries: StyleEntry[] = [];
  for (const key of order) {
    const value = values.get(key);
    if (value !== undefined) entries.push({ key, value });
  }
  return { text, entries, opaque: false };
}

/** Like `parseStyle`, but keeps malformed text as an opaque style instead of failing */
export function readStyle(text: string): Style {
  try {
    return parseStyle(text);
  } catch (err) {
    if (err instanceof MalformedStyleError) {
      return { text, entries: [], opaque: true };
    }
    throw err;
  }
}

export function serializeStyle(style: Style): string {
  return style.text;
}

export function getStyleValue(style: Style, key: string): StyleValue | undefined {
  return style.entries.find((e) => e.key === key)?.value;
}

/** Truthy the way draw.io reads flags: bare key, `1`, or `true` */
export function isStyleFlagSet(style: Style, key: string): boolean {
  const value = getStyleValue(style, key);
  return value === true || value === 1 || value === 'true';
}

/**
 * Make `key` a set flag: bare-prepended when absent, rewritten in place when
 * present with a false value. Opaque styles are returned unchanged.
 */
export function withStyleFlag(style: Style, key: string): Style {
  if (style.opaque || isStyleFlagSet(style, key)) return style;
  if (getStyleValue(style, key) !== undefined) return setStyleValues(style, { [key]: true });
  return parseStyle(joinStyleText(`${key};`, style.text));
}

export function styleToRecord(style: Style): Record<string, StyleValue> {
  const record: Record<string, StyleValue> = {};
  for (const { key, value } of style.entries) record[key] = value;
  return record;
}

/**
 * Apply a patch: one segment per key in first-occurrence order, new keys
 * appended, trailing `;` kept when the source had one (or was empty).
 * Keys the patch does not name keep their source text.
 */
export function setStyleValues(style: Style, patch: StylePatch): Style {
  if (style.opaque) {
    throw new MalformedStyleError(`Cannot modify unparseable style "${style.text}"`, style.text);
  }
  const raw = sourceSegments(style.text);
  const next = new Map<string, StyleValue>();
  for (const { key, value } of style.entries) next.set(key, value);
  const patched = new Set<string>();

  for (const [key, value] of Object.entries(patch)) {
    if (key === '' || INVALID_KEY.test(key)) {
      throw new MalformedStyleError(`Invalid style key "${key}"`, key);
    }
    if (value === null) {
      next.delete(key);
      continue;
    }
    if (typeof value === 'string' && value.includes(';')) {
      throw new MalformedStyleError(`Style value for "${key}" contains the ";" delimiter`, value);
    }
    next.set(key, value);
    patched.add(key);
  }

  const segments: string[] = [];
  for (const [key, value] of next) {
    const source = raw.get(key);
    segments.push(source !== undefined && !patched.has(key) ? source : formatSegment(key, value));
  }
  const trailing = style.text === '' || style.text.endsWith(';');
  const text = segments.length === 0 ? '' : segments.join(';') + (trailing ? ';' : '');
  return parseStyle(text);
}

/** Build a style from a record, e.g. for new elements */
export function styleFromRecord(record: StylePatch): Style {
  return setStyleValues(EMPTY_STYLE, record);
}

/** Concatenate style strings, inserting `;` where needed */
export function joinStyleText(...parts: string[]): string {
  let text = '';
  for (const part of parts) {
    if (part === '') continue;
    if (text !== '' && !text.endsWith(';')) text += ';';
    text += part;
  }
  return text;
}

/** Last source segment per key, as written */
function sourceSegments(text: string): Map<string, string> {
  const segments = new Map<string, string>();
  for (const segment of text.split(';')) {
    if (segment === '') continue;
    const eq = segment.indexOf('=');
    segments.set(eq === -1 ? segment : segment.slice(0, eq), segment);
  }
  return segments;
}

function typedValue(raw: string): StyleValue {
  return NUMBER_PATTERN.test(raw) ? Number(raw) : raw;
}

function formatSegment(key: string, value: StyleValue): string {
  if (value === true) return key;
  if (value === false) return `${key}=0`;
  return `${key}=${value}`;
}

// ── Registry ───────────────────────────────────────────────────────────

/**
 * Named styles. A style whose leading bare flags name registered styles
 * inherits their entries, the way draw.io stylesheets work.
 */
export class StyleRegistry {
  private readonly named = new Map<string, Style>();

  register(name: string, style: Style | string): void {
    this.named.set(name, typeof style === 'string' ? parseStyle(style) : style);
  }

  has(name: string): boolean {
    return this.named.has(name);
  }

  get(name: string): Style | undefined {
    return this.named.get(name);
  }

  names(): string[] {
    return [...this.named.keys()];
  }

  /** Effective properties after expanding named base styles */
  resolve(style: Style): Record<string, StyleValue> {
    return this.expand(style, new Set());
  }

  private expand(style: Style, visiting: Set<string>): Record<string, StyleValue> {
    const result: Record<string, StyleValue> = {};
    for (const { key, value } of style.entries) {
      const base = value === true && !visiting.has(key) ? this.named.get(key) : undefined;
      if (base) {
        visiting.add(key);
        Object.assign(result, this.expand(base, visiting));
        visiting.delete(key);
      }
      result[key] = value;
    }
    return result;
  }
}
