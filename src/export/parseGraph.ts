import { formatHeaderRef, Hlir } from '../hlir';
import { DotWriter } from './dot';

/** Parse states, the headers each extracts, and the select values between them. */
export function parseGraphToDot(hlir: Hlir): string {
  const writer = new DotWriter(`${hlir.name}_parser`);
  const pipelineTargets = new Set<string>();

  for (const state of hlir.parseStates.values()) {
    const extracts = state.extracts.map(formatHeaderRef);
    writer.node(state.name, {
      label: extracts.length > 0 ? `${state.name}\n${extracts.join(', ')}` : state.name,
      shape: 'ellipse',
    });
  }

  for (const state of hlir.parseStates.values()) {
    for (const transition of state.transitions) {
      if (transition.target === 'control') {
        pipelineTargets.add(transition.next);
      }
      writer.edge(state.name, transition.next, { label: transition.value });
    }
  }

  for (const pipeline of pipelineTargets) {
    writer.node(pipeline, { shape: 'doublecircle' });
  }

  return writer.toString();
}
