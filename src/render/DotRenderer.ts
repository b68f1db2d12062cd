import { walkGraph } from '../Graph';
import type { GraphRenderer } from '../Graph';
import { opSymbol } from '../Operations';
import type { Value } from '../Value';

export interface DotRendererOptions {
  /** Significant digits for value and grad. */
  precision?: number;
  graphName?: string;
}

const VALUE_COLOR = '#8ecae6';
const LEAF_COLOR = '#d9ed92';
const OP_COLOR = '#ffb703';
const GRAD_COLOR = '#219ebc';

/**
 * Renders a computation graph as Graphviz DOT text.
 *
 * Each value becomes a record node (label or value, plus grad); each producing
 * operation becomes a circle node wired operand -> op -> result.
 * @public
 */
export class DotRenderer implements GraphRenderer<Value> {
  private readonly precision: number;
  private readonly graphName: string;

  constructor(options: DotRendererOptions = {}) {
    this.precision = options.precision ?? 4;
    this.graphName = options.graphName ?? 'G';
  }

  render(root: Value): string {
    const { nodes, edges } = walkGraph<Value>(root);
    const ids = new Map<Value, string>();
    nodes.forEach((node, i) => ids.set(node, `n${i}`));
    const idOf = (node: Value): string => ids.get(node) ?? '';

    const lines: string[] = [
      `digraph ${dotId(this.graphName)} {`,
      '  bgcolor="white";',
      '  node [shape=record, style=filled, fontname="Helvetica", fontsize=12];',
    ];

    for (const node of nodes) {
      const id = idOf(node);
      const head = node.label !== undefined ? escapeRecord(node.label) : `value=${this.format(node.value)}`;
      const color = node.isLeaf ? LEAF_COLOR : VALUE_COLOR;
      lines.push(`  ${id} [label="<v> ${head}|<g> grad=${this.format(node.grad)}", fillcolor="${color}"];`);
      if (node.op !== undefined) {
        lines.push(`  op_${id} [label="${opSymbol(node.op)}", shape=circle, fillcolor="${OP_COLOR}", fontsize=16, fontcolor="black"];`);
        lines.push(`  op_${id} -> ${id} [color="${OP_COLOR}", penwidth=2];`);
      }
    }

    for (const edge of edges) {
      lines.push(`  ${idOf(edge.from)} -> op_${idOf(edge.to)} [color="${GRAD_COLOR}", penwidth=2];`);
    }

    lines.push('}');
    return lines.join('\n');
  }

  private format(x: number): string {
    return String(Number(x.toPrecision(this.precision)));
  }
}

/**
 * Plain identifiers are written as they are; anything else as a quoted string.
 */
function dotId(name: string): string {
  if (/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) return name;
  return `"${name.replace(/[\\"]/g, ch => `\\${ch}`)}"`;
}

function escapeRecord(text: string): string {
  return text.replace(/[\\{}|<>"]/g, ch => `\\${ch}`);
}
