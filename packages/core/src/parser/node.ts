/**
 * Raw node representation consumed by the uncertainty parsers.
 *
 * Mirrors an element of a logic-tree document: a tag (namespace prefixes such
 * as `gml:` are ignored when matching), optional text, attributes, children
 * and the source line when the loader knows it.
 */

import { LogicTreeError } from '../types/errors.js';

export interface UncertaintyNode {
  readonly tag: string;
  readonly text?: string;
  readonly attrib?: Readonly<Record<string, string | number>>;
  readonly nodes?: readonly UncertaintyNode[];
  readonly lineno?: number;
}

/**
 * Tag without namespace: `gml:posList` and `{http://...}posList` give `posList`
 */
export function localName(tag: string): string {
  const brace = tag.lastIndexOf('}');
  const stripped = brace >= 0 ? tag.slice(brace + 1) : tag;
  const colon = stripped.lastIndexOf(':');
  return colon >= 0 ? stripped.slice(colon + 1) : stripped;
}

export function childNodes(node: UncertaintyNode): readonly UncertaintyNode[] {
  return node.nodes ?? [];
}

export function findChild(
  node: UncertaintyNode,
  name: string
): UncertaintyNode | undefined {
  return childNodes(node).find((child) => localName(child.tag) === name);
}

const DECIMAL_FLOAT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse a float the way a document literal is read: surrounding blanks are
 * allowed, anything else that is not a complete decimal literal (hex, binary
 * and octal forms included) is rejected.
 */
export function toFloat(raw: string | number | undefined): number | undefined {
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : undefined;
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  if (!DECIMAL_FLOAT.test(trimmed)) return undefined;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Whitespace-separated floats; undefined when any token is not a number
 */
export function toFloatList(raw: string | undefined): number[] | undefined {
  if (raw === undefined) return undefined;
  const tokens = raw.trim().split(/\s+/).filter((t) => t !== '');
  const values: number[] = [];
  for (const token of tokens) {
    const value = toFloat(token);
    if (value === undefined) return undefined;
    values.push(value);
  }
  return values;
}

export function attrFloat(
  node: UncertaintyNode,
  key: string
): number | undefined {
  return toFloat(node.attrib?.[key]);
}

export function childFloat(
  node: UncertaintyNode,
  name: string
): number | undefined {
  return toFloat(findChild(node, name)?.text);
}

export function requireChild(
  node: UncertaintyNode,
  name: string,
  filename: string
): UncertaintyNode {
  const child = findChild(node, name);
  if (!child) {
    throw new LogicTreeError(node, filename, `missing '${name}' node`);
  }
  return child;
}
