import { spawnSync } from 'child_process';
import path from 'path';

import { log } from '../io';
import { RenderingUnavailable } from '../models';
import { errorMessage } from '../utils';

/** Format sentinel: keep the DOT text, render nothing. */
export const NO_RENDER = 'none';

/** Runs the layout tool once; throws when it fails. */
export type RenderCommand = (command: string, args: string[]) => void;

export interface RenderAttempt {
  format: string;
  reason: string;
}

export interface RenderOutcome {
  /** `undefined` when the sentinel was reached before any format succeeded */
  format?: string;
  outputPath?: string;
  attempts: RenderAttempt[];
}

export const runGraphviz: RenderCommand = (command, args) => {
  const result = spawnSync(command, args, { encoding: 'utf8' });
  if (result.error) {
    throw result.error;
  }
  if (result.status !== 0) {
    throw new Error(result.stderr.trim() || `${command} exited with status ${result.status}`);
  }
};

/**
 * Renders `dotFile` with Graphviz, trying `formats` in order until one works or
 * the {@link NO_RENDER} sentinel comes up.
 */
export function renderDotFile(dotFile: string, formats: string[], run: RenderCommand = runGraphviz): RenderOutcome {
  const attempts: RenderAttempt[] = [];
  const base = dotFile.replace(/\.dot$/, '');

  for (const format of formats) {
    if (format === NO_RENDER) {
      log.debug(`skipping rendering of ${path.basename(dotFile)}`);
      return { attempts };
    }
    const outputPath = `${base}.${format}`;
    try {
      run('dot', [`-T${format}`, dotFile, '-o', outputPath]);
      return { format, outputPath, attempts };
    } catch (err) {
      const reason = errorMessage(err);
      log.debug(`rendering ${path.basename(dotFile)} as ${format} failed: ${reason}`);
      attempts.push({ format, reason });
    }
  }

  if (attempts.length === 0) {
    return { attempts };
  }
  throw new RenderingUnavailable(
    `Unable to render ${path.basename(dotFile)}: ${attempts.map(attempt => `${attempt.format} (${attempt.reason})`).join(', ')}`,
    attempts
  );
}
