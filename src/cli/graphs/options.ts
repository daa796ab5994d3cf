import { AnalysisConfig } from '../../analysis';
import { DependencyDotOptions } from '../../export';
import { ConfigurationError, LogLevel } from '../../models';

export type GraphKind = 'parser' | 'tables' | 'deps';

export const GRAPH_KINDS: ReadonlyArray<GraphKind> = ['parser', 'tables', 'deps'];

export interface GraphsOptions {
  genDir?: string;
  define?: Array<string>;
  include?: Array<string>;
  primitives?: Array<string>;
  frontend?: string;
  parseGraph?: boolean;
  tableGraph?: boolean;
  deps?: boolean;
  splitMatchActionEvents?: boolean; // fine-grained match/action events
  depReduction?: boolean; // --no-dep-reduction
  criticalPathOnly?: boolean;
  showConds?: boolean; // conditionals occupy a stage
  controlFlowEdges?: boolean; // --no-control-flow-edges: hide them in the drawing
  dataDepsOnly?: boolean; // drop control-flow-only edges before scheduling
  conditionText?: boolean;
  fields?: boolean;
  debugStages?: boolean;
  debugWidths?: boolean;
  format?: Array<string>;
  silent?: boolean;
  verbose?: boolean;
}

export const DEFAULT_FORMATS = ['png', 'none'];

export function getLogLevel(cliOptions: GraphsOptions): LogLevel | undefined {
  if (cliOptions.silent) {
    return LogLevel.error;
  }
  if (cliOptions.verbose) {
    return LogLevel.trace;
  }
  return undefined;
}

export function selectedGraphKinds(cliOptions: GraphsOptions): GraphKind[] {
  const kinds: GraphKind[] = [];
  if (cliOptions.parseGraph) {
    kinds.push('parser');
  }
  if (cliOptions.tableGraph) {
    kinds.push('tables');
  }
  if (cliOptions.deps) {
    kinds.push('deps');
  }
  return kinds.length > 0 ? kinds : [...GRAPH_KINDS];
}

export function toAnalysisConfig(cliOptions: GraphsOptions): AnalysisConfig {
  const split = !!cliOptions.splitMatchActionEvents;
  if (cliOptions.criticalPathOnly && !split) {
    throw new ConfigurationError('--critical-path-only needs --split-match-action-events');
  }
  return {
    mode: split ? 'fine' : 'coarse',
    reduce: !split && cliOptions.depReduction !== false,
    countConditionals: !!cliOptions.showConds,
    controlFlowEdges: !cliOptions.dataDepsOnly,
  };
}

export function toDependencyDotOptions(cliOptions: GraphsOptions): DependencyDotOptions {
  return {
    showControlFlow: cliOptions.controlFlowEdges !== false,
    showFields: !!cliOptions.fields,
    showConditionText: !!cliOptions.conditionText,
    criticalOnly: !!cliOptions.criticalPathOnly,
    debugStages: !!cliOptions.debugStages,
    debugWidths: !!cliOptions.debugWidths,
  };
}

/** `-D`/`-I` flags for the front end, in the order given. */
export function preprocessorArgs(cliOptions: GraphsOptions): string[] {
  return [
    ...(cliOptions.define || []).map(define => `-D${define}`),
    ...(cliOptions.include || []).map(include => `-I${include}`),
  ];
}

export function renderFormats(cliOptions: GraphsOptions): string[] {
  return cliOptions.format && cliOptions.format.length > 0 ? cliOptions.format : DEFAULT_FORMATS;
}
