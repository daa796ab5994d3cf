import { execFile } from 'child_process';
import { promises as fs } from 'fs';
import path from 'path';
import { promisify } from 'util';

import { log } from '../io';
import { ConfigurationError, IrLoadError } from '../models';
import { errorMessage } from '../utils';
import { loadHlir } from './loader';
import { Hlir, PrimitiveTable } from './types';

const execFileAsync = promisify(execFile);

export interface FrontendRequest {
  sourcePath: string;
  /** `-D`/`-I` style flags, forwarded untouched */
  preprocessorArgs: string[];
  primitives: PrimitiveTable;
}

/** Produces the HLIR of one program; parsing P4 text lives behind this seam. */
export interface IrFrontend {
  readonly name: string;
  load(request: FrontendRequest): Promise<Hlir>;
}

function programName(sourcePath: string): string {
  return path.basename(sourcePath, path.extname(sourcePath));
}

function parseSnapshot(text: string, origin: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new IrLoadError(`${origin} is not a valid HLIR snapshot: ${errorMessage(err)}`);
  }
}

export class JsonSnapshotFrontend implements IrFrontend {
  readonly name = 'json';

  async load(request: FrontendRequest): Promise<Hlir> {
    if (request.preprocessorArgs.length > 0) {
      log.debug(`ignoring preprocessor flags for snapshot input: ${request.preprocessorArgs.join(' ')}`);
    }
    let text: string;
    try {
      text = await fs.readFile(request.sourcePath, 'utf-8');
    } catch (err) {
      throw new IrLoadError(`Unable to read ${request.sourcePath}: ${errorMessage(err)}`);
    }
    return loadHlir(parseSnapshot(text, request.sourcePath), {
      name: programName(request.sourcePath),
      primitives: request.primitives,
    });
  }
}

/**
 * Runs an external front end as `<command> <source> <preprocessor flags...>` and
 * reads the HLIR snapshot it prints on stdout.
 */
export class CommandFrontend implements IrFrontend {
  readonly name: string;
  private readonly executable: string;
  private readonly baseArgs: string[];

  constructor(command: string) {
    const [executable, ...baseArgs] = command.trim().split(/\s+/);
    if (!executable) {
      throw new ConfigurationError('Front-end command must not be empty');
    }
    this.name = executable;
    this.executable = executable;
    this.baseArgs = baseArgs;
  }

  async load(request: FrontendRequest): Promise<Hlir> {
    const args = [...this.baseArgs, request.sourcePath, ...request.preprocessorArgs];
    log.debug(`running front end: ${this.executable} ${args.join(' ')}`);
    let stdout: string;
    try {
      ({ stdout } = await execFileAsync(this.executable, args, { encoding: 'utf8', maxBuffer: 64 * 1024 * 1024 }));
    } catch (err) {
      throw new IrLoadError(`Front end "${this.executable}" failed for ${request.sourcePath}: ${errorMessage(err)}`);
    }
    return loadHlir(parseSnapshot(stdout, `output of ${this.executable}`), {
      name: programName(request.sourcePath),
      primitives: request.primitives,
    });
  }
}

export function selectFrontend(sourcePath: string, frontendCommand?: string): IrFrontend {
  if (path.extname(sourcePath).toLowerCase() === '.json') {
    return new JsonSnapshotFrontend();
  }
  if (!frontendCommand) {
    throw new ConfigurationError(
      `${sourcePath} is not an HLIR snapshot (.json); pass --frontend <command> to compile P4 sources`
    );
  }
  return new CommandFrontend(frontendCommand);
}
