/**
 * A parsed bureau report element as handed over by the XML reader.
 *
 * `attributes` keeps document order (string keys preserve insertion order).
 * `text` is the character data before the first child element, and is only
 * set when that data is non-empty.
 */
export interface RawNode {
  tag: string;
  attributes: Record<string, string>;
  children: RawNode[];
  text?: string;
}

export function createRawNode(
  tag: string,
  init: { attributes?: Record<string, string>; children?: RawNode[]; text?: string } = {}
): RawNode {
  const node: RawNode = {
    tag,
    attributes: init.attributes ?? {},
    children: init.children ?? [],
  };
  if (init.text !== undefined) {
    node.text = init.text;
  }
  return node;
}
