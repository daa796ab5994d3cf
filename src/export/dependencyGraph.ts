import { AnalysisResult, DependencyEdge, Event } from '../analysis';
import { formatExpression, Hlir, tableActionDataWidth, tableKeyWidth } from '../hlir';
import { DotAttributes, DotWriter } from './dot';

export interface DependencyDotOptions {
  /** draw control-flow-only edges */
  showControlFlow: boolean;
  /** list the responsible fields on field edges */
  showFields: boolean;
  /** print the condition under a conditional's name */
  showConditionText: boolean;
  /** split graphs only: draw the critical dependencies and nothing else */
  criticalOnly: boolean;
  debugStages: boolean;
  debugWidths: boolean;
}

export const DEFAULT_DEPENDENCY_DOT_OPTIONS: DependencyDotOptions = {
  showControlFlow: true,
  showFields: false,
  showConditionText: false,
  criticalOnly: false,
  debugStages: false,
  debugWidths: false,
};

const CRITICAL_COLOR = 'red';

function stageOf(analysis: AnalysisResult, index: number): number {
  return analysis.mode === 'coarse' ? analysis.schedule.stages[index] : analysis.criticalPath.earliest[index];
}

function eventLabel(hlir: Hlir, analysis: AnalysisResult, event: Event, options: DependencyDotOptions): string {
  const lines = [event.id];
  if (event.role === 'conditional' && options.showConditionText) {
    const conditional = hlir.conditionals.get(event.node);
    if (conditional) {
      lines.push(formatExpression(conditional.expression));
    }
  }
  if (options.debugStages) {
    lines.push(`stage ${stageOf(analysis, event.index)}`);
  }
  if (options.debugWidths && (event.role === 'table' || event.role === 'match')) {
    const table = hlir.tables.get(event.node);
    if (table) {
      lines.push(`key ${tableKeyWidth(hlir, table)}b, data ${tableActionDataWidth(hlir, table)}b`);
    }
  }
  return lines.join('\n');
}

function edgeAttributes(edge: DependencyEdge, critical: boolean, options: DependencyDotOptions): DotAttributes {
  const color = critical ? CRITICAL_COLOR : undefined;
  switch (edge.kind) {
    case 'intra':
      return { style: 'dotted', arrowhead: 'none', color };
    case 'control':
      return { label: 'control', style: 'dashed', color: color ?? 'gray50' };
    case 'field':
      return {
        label: options.showFields && edge.fields.length > 0 ? ['field', ...edge.fields].join('\n') : 'field',
        color,
      };
  }
}

/** DOT text of an analysed table dependency graph. */
export function dependencyGraphToDot(
  hlir: Hlir,
  analysis: AnalysisResult,
  options: Partial<DependencyDotOptions> = {}
): string {
  const resolved: DependencyDotOptions = { ...DEFAULT_DEPENDENCY_DOT_OPTIONS, ...options };
  const { graph } = analysis;
  const criticalEdges = new Set(analysis.mode === 'fine' ? analysis.criticalPath.edges : []);
  const criticalEvents = new Set(analysis.mode === 'fine' ? analysis.criticalPath.events : []);
  const criticalOnly = resolved.criticalOnly && analysis.mode === 'fine';

  const writer = new DotWriter(`${hlir.name}_dependencies`, {
    label: `${hlir.name}: ${analysis.stageCount} stages`,
    labelloc: 't',
  });

  for (const event of graph.events) {
    writer.node(event.id, {
      label: eventLabel(hlir, analysis, event, resolved),
      shape: event.role === 'conditional' ? 'box' : 'ellipse',
      color: criticalEvents.has(event.index) ? CRITICAL_COLOR : undefined,
    });
  }

  for (const edge of graph.edges) {
    if (edge.kind === 'control' && !resolved.showControlFlow) {
      continue;
    }
    const critical = edge.kind === 'intra' ? criticalEvents.has(edge.source) && criticalEvents.has(edge.target) : criticalEdges.has(edge);
    if (criticalOnly && !critical) {
      continue;
    }
    writer.edge(graph.event(edge.source).id, graph.event(edge.target).id, edgeAttributes(edge, critical, resolved));
  }

  return writer.toString();
}
