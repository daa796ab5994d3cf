import { collectControlFlow } from '../analysis';
import { formatExpression, Hlir, tableNextEntries } from '../hlir';
import { DotWriter } from './dot';

export interface ControlFlowDotOptions {
  showConditionText: boolean;
}

/** Tables and conditionals as written in the program, with branch labels. */
export function controlFlowToDot(hlir: Hlir, options: Partial<ControlFlowDotOptions> = {}): string {
  const writer = new DotWriter(`${hlir.name}_tables`);

  // pipelines live in their own id space, a table may share a pipeline's name
  for (const [pipeline, entry] of hlir.pipelines) {
    const id = `pipeline:${pipeline}`;
    writer.node(id, { label: pipeline, shape: 'doublecircle' });
    if (entry !== null) {
      writer.edge(id, entry);
    }
  }

  for (const { name, node } of collectControlFlow(hlir)) {
    if (node.kind === 'conditional') {
      const label = options.showConditionText ? `${name}\n${formatExpression(node.expression)}` : name;
      writer.node(name, { label, shape: 'box' });
      if (node.trueNext !== null) {
        writer.edge(name, node.trueNext, { label: 'true' });
      }
      if (node.falseNext !== null) {
        writer.edge(name, node.falseNext, { label: 'false' });
      }
      continue;
    }
    writer.node(name, { shape: 'ellipse' });
    for (const [label, next] of tableNextEntries(node.next)) {
      if (next !== null) {
        writer.edge(name, next, label ? { label } : {});
      }
    }
  }

  return writer.toString();
}
