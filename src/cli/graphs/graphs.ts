import chalk from 'chalk';
import { Command } from 'commander';

import { log } from '../../io';
import { generateGraphs, GenerateRuntime } from './generate';
import { DEFAULT_FORMATS, getLogLevel, GraphsOptions } from './options';

function collect(value: string, previous: Array<string> = []): Array<string> {
  return [...previous, value];
}

/** `runtime` replaces the Graphviz invocation, for callers that render elsewhere. */
export function graphsCommand(runtime?: GenerateRuntime) {
  const program = new Command('p4graphs')
    .description('Parse graphs, table control flow and table dependency graphs for P4 programs')
    .usage('<source> [options]')
    .argument('<source>', 'HLIR snapshot (.json), or a P4 program when --frontend is given')
    .option('--gen-dir <dir>', 'directory the graphs are written to', '.')
    .option('-D, --define <definition>', 'preprocessor definition passed to the front end', collect)
    .option('-I, --include <dir>', 'include directory passed to the front end', collect)
    .option('--primitives <files...>', 'additional primitive definition documents (glob patterns)')
    .option('--frontend <command>', 'command printing the HLIR snapshot of a P4 program')
    .option('--parse-graph', 'generate the parse graph')
    .option('--table-graph', 'generate the table control flow graph')
    .option('--deps', 'generate the table dependency graph')
    .option('--split-match-action-events', 'schedule match and action of each table as separate events')
    .option('--no-dep-reduction', 'keep transitively implied dependencies')
    .option('--critical-path-only', 'only draw the dependencies on a critical path (split events)')
    .option('--show-conds', 'count conditionals as occupying a stage')
    .option('--no-control-flow-edges', 'do not draw control-flow-only dependencies')
    .option('--data-deps-only', 'ignore control-flow-only dependencies when counting stages')
    .option('--condition-text', 'print conditions in node labels')
    .option('--fields', 'print the fields responsible for each dependency')
    .option('--debug-stages', 'print and annotate the computed stage of each event')
    .option('--debug-widths', 'print and annotate key and action data widths')
    .option('--format <formats...>', `rendering formats tried in order, "none" to skip rendering`, DEFAULT_FORMATS)
    .option('-s, --silent', 'log only errors')
    .option('-v, --verbose', 'make the operation more talkative')
    .action((source: string, options: GraphsOptions) => execute(source, options, runtime));
  return program;
}

async function execute(source: string, options: GraphsOptions, runtime?: GenerateRuntime): Promise<void> {
  log.setLevel(getLogLevel(options));

  const result = await generateGraphs(source, options, runtime);
  for (const output of result.outputs) {
    if (output.error) {
      log.warn(chalk`{yellow ${output.kind}}: ${output.dotPath} written, rendering failed`);
    } else {
      log.info(chalk`{green ${output.kind}}: ${output.renderedPath ?? output.dotPath}`);
    }
  }

  if (result.outputs.some(output => output.error)) {
    process.exitCode = 1;
  }
}
