import { LineIndex } from '../utils/position.js';
import {
  NODE_TYPES,
  type FieldName,
  type NodeType,
  type RawNode,
  type RawTree,
  type SyntaxNode,
} from './types.js';

export class ConversionError extends Error {
  constructor(message: string, public nodeType: string) {
    super(message);
    this.name = 'ConversionError';
  }
}

const NODE_TYPE_SET: ReadonlySet<string> = new Set(NODE_TYPES);

const FIELD_NAMES: ReadonlySet<string> = new Set<FieldName>([
  'name', 'argument', 'redirect', 'condition', 'body', 'alternative',
  'variable', 'value', 'item', 'pattern', 'descriptor', 'assignment',
]);

function isNodeType(type: string): type is NodeType {
  return NODE_TYPE_SET.has(type);
}

function isFieldName(field: string): field is FieldName {
  return FIELD_NAMES.has(field);
}

/**
 * Convert an engine tree into {@link SyntaxNode}s. Every node type must belong
 * to the closed vocabulary; anything else throws {@link ConversionError}.
 */
export function toSyntaxTree(raw: RawTree): SyntaxNode {
  const lines = new LineIndex(raw.text);
  return convertNode(raw.root, raw.text, lines);
}

function convertNode(node: RawNode, text: string, lines: LineIndex): SyntaxNode {
  if (!isNodeType(node.type)) {
    throw new ConversionError(`Unknown node type: ${node.type}`, node.type);
  }

  const children: SyntaxNode[] = [];
  const fields: Partial<Record<FieldName, SyntaxNode[]>> = {};

  for (const child of node.children) {
    const converted = convertNode(child, text, lines);
    children.push(converted);
    if (child.field !== null && isFieldName(child.field)) {
      const list = fields[child.field] ?? [];
      list.push(converted);
      fields[child.field] = list;
    }
  }

  return {
    id: node.id,
    type: node.type,
    range: lines.rangeOf(node.startIndex, node.endIndex),
    text: text.slice(node.startIndex, node.endIndex),
    children,
    fields,
    missing: [...node.missing],
  };
}
