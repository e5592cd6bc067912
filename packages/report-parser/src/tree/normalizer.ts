import type { RawNode } from './raw-node.js';

export interface NormalizedLeaf {
  readonly kind: 'leaf';
  readonly value: string;
}

export interface NormalizedObject {
  readonly kind: 'object';
  readonly entries: ReadonlyMap<string, NormalizedValue>;
}

/** Only materialized when two or more siblings share a key. */
export interface NormalizedList {
  readonly kind: 'list';
  readonly items: readonly NormalizedValue[];
}

export type NormalizedValue = NormalizedLeaf | NormalizedObject | NormalizedList;

export type PlainValue = string | PlainValue[] | { [key: string]: PlainValue };

/** Key under which element text is stored when the element also has attributes or children. */
export const TEXT_ENTRY_KEY = 'text';

export function leaf(value: string): NormalizedLeaf {
  return { kind: 'leaf', value };
}

/**
 * Converts a parsed element into a nested mapping.
 *
 * Attributes seed the mapping in attribute order, then children are added in
 * document order. A key seen twice becomes a list in first-occurrence order;
 * an attribute and a child sharing a name collapse the same way. Non-blank
 * text turns an otherwise empty element into a leaf, or is stored under
 * `"text"` (replacing any existing `"text"` entry).
 */
export function normalize(node: RawNode): NormalizedValue {
  // Values per key in first-occurrence order; collapsed once all children are in.
  const groups = new Map<string, NormalizedValue[]>();
  const add = (key: string, value: NormalizedValue): void => {
    const group = groups.get(key);
    if (group === undefined) {
      groups.set(key, [value]);
    } else {
      group.push(value);
    }
  };

  for (const [name, value] of Object.entries(node.attributes)) {
    add(name, leaf(value));
  }
  for (const child of node.children) {
    add(child.tag, normalize(child));
  }

  const text = node.text?.trim() ?? '';
  if (text !== '') {
    if (groups.size === 0) {
      return leaf(text);
    }
    groups.set(TEXT_ENTRY_KEY, [leaf(text)]);
  }

  const entries = new Map<string, NormalizedValue>();
  for (const [key, values] of groups) {
    const [first] = values;
    if (values.length === 1 && first !== undefined) {
      entries.set(key, first);
    } else {
      entries.set(key, { kind: 'list', items: values });
    }
  }
  return { kind: 'object', entries };
}

/** Looks up a key on an object value; any other shape has no keys. */
export function getEntry(value: NormalizedValue | undefined, key: string): NormalizedValue | undefined {
  if (value === undefined || value.kind !== 'object') {
    return undefined;
  }
  return value.entries.get(key);
}

export function getPath(value: NormalizedValue | undefined, path: readonly string[]): NormalizedValue | undefined {
  let current = value;
  for (const key of path) {
    current = getEntry(current, key);
    if (current === undefined) {
      return undefined;
    }
  }
  return current;
}

/**
 * Reads a scalar field. An element carrying attributes alongside its text
 * resolves to that text; lists and nested objects have no scalar value.
 */
export function scalarOf(value: NormalizedValue | undefined): string | null {
  if (value === undefined) {
    return null;
  }
  switch (value.kind) {
    case 'leaf':
      return value.value;
    case 'object': {
      const text = value.entries.get(TEXT_ENTRY_KEY);
      return text?.kind === 'leaf' ? text.value : null;
    }
    case 'list':
      return null;
  }
}

/** Absent → empty, list → its items, anything else → a single item. */
export function asSequence(value: NormalizedValue | undefined): readonly NormalizedValue[] {
  if (value === undefined) {
    return [];
  }
  return value.kind === 'list' ? value.items : [value];
}

/** Plain JSON view of a normalized tree (objects keep key order). */
export function toPlainValue(value: NormalizedValue): PlainValue {
  switch (value.kind) {
    case 'leaf':
      return value.value;
    case 'list':
      return value.items.map(toPlainValue);
    case 'object':
      return Object.fromEntries(
        [...value.entries].map(([key, entry]): [string, PlainValue] => [key, toPlainValue(entry)])
      );
  }
}
