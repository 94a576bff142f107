import { toHex } from '../helpers';
import type { TagNames } from '../tag';
import type { TtlvNode } from '../TtlvNode';
import type { Value } from '../value';

const INDENT = '  ';
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function tagLabel(tag: number, names: TagNames | undefined): string {
  const name = names?.nameOf(tag);
  if (name !== undefined && IDENTIFIER.test(name)) return name;
  return `0x${tag.toString(16).padStart(4, '0')}`;
}

function scalarText(value: Exclude<Value, { type: 'Structure' }>): string {
  switch (value.type) {
    case 'Integer':
    case 'Enumeration':
    case 'Interval':
    case 'Boolean':
      return String(value.value);
    case 'LongInteger':
    case 'DateTime':
      return value.value.toString();
    case 'TextString':
      return JSON.stringify(value.value);
    case 'ByteString':
    case 'BigInteger':
      return `<${toHex(value.value)}>`;
  }
}

function writeNode(node: TtlvNode, depth: number, names: TagNames | undefined, lines: string[]): void {
  const pad = INDENT.repeat(depth);
  const label = tagLabel(node.tag, names);
  const value = node.value;
  if (value.type !== 'Structure') {
    lines.push(`${pad}${label}: ${value.type} ${scalarText(value)}`);
    return;
  }
  if (value.value.length === 0) {
    lines.push(`${pad}${label}: Structure {}`);
    return;
  }
  lines.push(`${pad}${label}: Structure {`);
  for (const child of value.value) {
    writeNode(child, depth + 1, names, lines);
  }
  lines.push(`${pad}}`);
}

/**
 * Render a node tree as text notation, one node per line.
 * Tags print by name when `names` knows them, otherwise as 4-digit hex.
 */
export function formatNotation(node: TtlvNode, names?: TagNames): string {
  const lines: string[] = [];
  writeNode(node, 0, names, lines);
  return lines.join('\n');
}
