import { join } from 'path';

import { log } from '../io';
import { isP4GraphError } from '../models';
import * as utils from '../utils';
import { GenerateRuntime } from './graphs/generate';
import { graphsCommand } from './graphs/graphs';

export async function createProgram(runtime?: GenerateRuntime) {
  const packageJson = await utils.parseJson(join(__dirname, '../../package.json'));
  const program = graphsCommand(runtime);
  const version = utils.isRecord(packageJson) && typeof packageJson.version === 'string' ? packageJson.version : '0.0.1';
  program.version(version);
  return program;
}

/** Runs the program once; failures end up in `process.exitCode`, never thrown. */
export async function run(rawArgs: string[], runtime?: GenerateRuntime): Promise<void> {
  try {
    const program = await createProgram(runtime);
    await program.parseAsync(rawArgs);
  } catch (err) {
    if (isP4GraphError(err)) {
      log.error(`${err.name}: ${err.message}`);
    } else {
      console.error(err);
    }
    if (!process.exitCode) {
      process.exitCode = 1;
    }
  }
}

export async function execute(rawArgs: string[]): Promise<void> {
  try {
    await run(rawArgs);
  } finally {
    // commander resolves before pending handles close
    // eslint-disable-next-line node/no-process-exit
    process.exit();
  }
}
