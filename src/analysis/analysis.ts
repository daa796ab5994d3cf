import { Hlir } from '../hlir';
import { log } from '../io';
import { DependencyGraph } from './graph';
import { buildDependencyGraph } from './graphBuilder';
import { transitiveReduction } from './reducer';
import { countMinStages, criticalPath, CriticalPath, StageSchedule } from './scheduler';
import { AnalysisMode } from './types';

export interface AnalysisConfig {
  mode: AnalysisMode;
  /** coarse only: drop transitively implied edges before scheduling */
  reduce: boolean;
  countConditionals: boolean;
  controlFlowEdges: boolean;
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  mode: 'coarse',
  reduce: true,
  countConditionals: false,
  controlFlowEdges: true,
};

export interface CoarseAnalysis {
  readonly mode: 'coarse';
  readonly graph: DependencyGraph;
  readonly reduced: boolean;
  readonly schedule: StageSchedule;
  readonly stageCount: number;
}

export interface FineAnalysis {
  readonly mode: 'fine';
  readonly graph: DependencyGraph;
  readonly criticalPath: CriticalPath;
  readonly stageCount: number;
}

export type AnalysisResult = CoarseAnalysis | FineAnalysis;

interface AnalysisStrategy<R extends AnalysisResult> {
  run(hlir: Hlir, config: AnalysisConfig): R;
}

/** Each mode pairs its own graph granularity with its own scheduler. */
const strategies: { [M in AnalysisMode]: AnalysisStrategy<Extract<AnalysisResult, { mode: M }>> } = {
  coarse: {
    run(hlir, config) {
      const built = buildDependencyGraph(hlir, { mode: 'coarse', controlFlowEdges: config.controlFlowEdges });
      const graph = config.reduce ? transitiveReduction(built) : built;
      const schedule = countMinStages(graph, { countConditionals: config.countConditionals });
      return { mode: 'coarse', graph, reduced: config.reduce, schedule, stageCount: schedule.minStages };
    },
  },
  fine: {
    run(hlir, config) {
      if (config.reduce) {
        log.debug('split match/action graphs are never reduced');
      }
      const graph = buildDependencyGraph(hlir, { mode: 'fine', controlFlowEdges: config.controlFlowEdges });
      const path = criticalPath(graph, { countConditionals: config.countConditionals });
      return { mode: 'fine', graph, criticalPath: path, stageCount: path.length };
    },
  },
};

export function runAnalysis(hlir: Hlir, config: Partial<AnalysisConfig> = {}): AnalysisResult {
  const resolved: AnalysisConfig = { ...DEFAULT_ANALYSIS_CONFIG, ...config };
  const result = strategies[resolved.mode].run(hlir, resolved);
  log.debug(`${hlir.name}: ${result.stageCount} stages (${resolved.mode})`);
  return result;
}
