import chalk from 'chalk';
import { promises as fs } from 'fs';
import path from 'path';

import { AnalysisResult, runAnalysis, slack } from '../../analysis';
import { controlFlowToDot, dependencyGraphToDot, parseGraphToDot, RenderCommand, renderDotFile, runGraphviz } from '../../export';
import { Hlir, loadPrimitiveTable, selectFrontend, tableActionDataWidth, tableKeyWidth } from '../../hlir';
import { log } from '../../io';
import { ConfigurationError, RenderingUnavailable } from '../../models';
import {
  GraphKind,
  GraphsOptions,
  preprocessorArgs,
  renderFormats,
  selectedGraphKinds,
  toAnalysisConfig,
  toDependencyDotOptions,
} from './options';

export interface GraphOutput {
  kind: GraphKind;
  dotPath: string;
  renderedPath?: string;
  error?: RenderingUnavailable;
}

export interface GenerateResult {
  hlir: Hlir;
  analysis?: AnalysisResult;
  outputs: GraphOutput[];
}

export interface GenerateRuntime {
  render: RenderCommand;
}

const defaultRuntime: GenerateRuntime = {
  render: runGraphviz,
};

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

async function isFile(file: string): Promise<boolean> {
  try {
    return (await fs.stat(file)).isFile();
  } catch {
    return false;
  }
}

function logStages(analysis: AnalysisResult) {
  const { graph } = analysis;
  if (analysis.mode === 'coarse') {
    const byStage = new Map<number, string[]>();
    graph.events.forEach(event => {
      const stage = analysis.schedule.stages[event.index];
      byStage.set(stage, [...(byStage.get(stage) || []), event.id]);
    });
    for (const stage of Array.from(byStage.keys()).sort((a, b) => a - b)) {
      log.info(chalk`{cyan stage ${stage}}: ${(byStage.get(stage) || []).join(', ')}`);
    }
    return;
  }
  const { earliest, latest } = analysis.criticalPath;
  for (const event of graph.events) {
    log.info(
      chalk`{cyan ${event.id}}: earliest ${earliest[event.index]}, latest ${latest[event.index]}, slack ${slack(
        analysis.criticalPath,
        event.index
      )}`
    );
  }
}

function logWidths(hlir: Hlir) {
  for (const table of hlir.tables.values()) {
    log.info(
      chalk`{cyan ${table.name}}: key ${tableKeyWidth(hlir, table)} bits, action data ${tableActionDataWidth(hlir, table)} bits`
    );
  }
}

/**
 * Validates the configuration, loads the program, writes one DOT file per
 * requested graph kind and renders each of them. A rendering failure is kept
 * on its output and never aborts the other graph kinds.
 */
export async function generateGraphs(
  source: string,
  cliOptions: GraphsOptions,
  runtime: GenerateRuntime = defaultRuntime
): Promise<GenerateResult> {
  const config = toAnalysisConfig(cliOptions);
  const dotOptions = toDependencyDotOptions(cliOptions);
  const formats = renderFormats(cliOptions);
  const kinds = selectedGraphKinds(cliOptions);

  const genDir = path.resolve(cliOptions.genDir || '.');
  if (!(await isDirectory(genDir))) {
    throw new ConfigurationError(`${genDir} is not a directory`);
  }
  if (!(await isFile(source))) {
    throw new ConfigurationError(`${source} is not a file`);
  }
  const primitives = await loadPrimitiveTable(cliOptions.primitives);
  const frontend = selectFrontend(source, cliOptions.frontend);

  log.debug(`loading ${source} with the ${frontend.name} front end`);
  const hlir = await frontend.load({ sourcePath: source, preprocessorArgs: preprocessorArgs(cliOptions), primitives });

  let analysis: AnalysisResult | undefined;
  const outputs: GraphOutput[] = [];
  for (const kind of kinds) {
    let text: string;
    if (kind === 'parser') {
      text = parseGraphToDot(hlir);
    } else if (kind === 'tables') {
      text = controlFlowToDot(hlir, { showConditionText: dotOptions.showConditionText });
    } else {
      analysis = runAnalysis(hlir, config);
      log.info(
        analysis.mode === 'coarse'
          ? chalk`{bold ${hlir.name}}: minimum number of stages {bold ${analysis.stageCount}}`
          : chalk`{bold ${hlir.name}}: critical path length {bold ${analysis.stageCount}} stages`
      );
      if (dotOptions.debugStages) {
        logStages(analysis);
      }
      if (dotOptions.debugWidths) {
        logWidths(hlir);
      }
      text = dependencyGraphToDot(hlir, analysis, dotOptions);
    }

    const dotPath = path.join(genDir, `${hlir.name}.${kind}.dot`);
    await fs.writeFile(dotPath, text, 'utf-8');
    log.debug(`wrote ${dotPath}`);

    const output: GraphOutput = { kind, dotPath };
    try {
      const rendered = renderDotFile(dotPath, formats, runtime.render);
      output.renderedPath = rendered.outputPath;
    } catch (err) {
      if (!(err instanceof RenderingUnavailable)) {
        throw err;
      }
      log.error(err.message);
      output.error = err;
    }
    outputs.push(output);
  }

  return { hlir, analysis, outputs };
}
