import { promises as fs } from 'fs';
import globby from 'globby';

import { log } from '../io';
import { ConfigurationError } from '../models';
import { errorMessage, isRecord } from '../utils';
import { OrderedMap } from './orderedMap';
import builtinDocument from './primitives.json';
import { AccessMode, PrimitiveArgProperty, PrimitiveDefinition, PrimitiveTable } from './types';

const ACCESS_MODES: ReadonlyArray<AccessMode> = ['read', 'write', 'read_write'];

export function isWriteAccess(access: AccessMode): boolean {
  return access === 'write' || access === 'read_write';
}

export function isReadAccess(access: AccessMode): boolean {
  return access === 'read' || access === 'read_write';
}

/**
 * Validates one primitive definition document: an object mapping primitive
 * names to `{ args, optional?, properties }`.
 */
export function parsePrimitiveDocument(document: unknown, source: string): PrimitiveDefinition[] {
  if (!isRecord(document)) {
    throw new ConfigurationError(`${source}: primitive definitions must be an object`);
  }
  return Object.entries(document).map(([name, raw]) => parsePrimitive(name, raw, source));
}

function parsePrimitive(name: string, raw: unknown, source: string): PrimitiveDefinition {
  const where = `${source}: primitive "${name}"`;
  if (!isRecord(raw)) {
    throw new ConfigurationError(`${where} must be an object`);
  }
  const args = toStringList(raw.args, `${where} args`);
  const optional = raw.optional === undefined ? [] : toStringList(raw.optional, `${where} optional`);
  for (const arg of optional) {
    if (!args.includes(arg)) {
      throw new ConfigurationError(`${where}: optional argument "${arg}" is not declared in args`);
    }
  }

  const properties: Array<[string, PrimitiveArgProperty]> = [];
  const rawProperties = raw.properties ?? {};
  if (!isRecord(rawProperties)) {
    throw new ConfigurationError(`${where} properties must be an object`);
  }
  for (const [arg, value] of Object.entries(rawProperties)) {
    if (!args.includes(arg)) {
      throw new ConfigurationError(`${where}: property for undeclared argument "${arg}"`);
    }
    properties.push([arg, parseArgProperty(value, `${where} argument "${arg}"`)]);
  }

  return { name, args, optional, properties: new OrderedMap(properties) };
}

function parseArgProperty(raw: unknown, where: string): PrimitiveArgProperty {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`${where} must be an object`);
  }
  const access = ACCESS_MODES.find(mode => mode === raw.access);
  if (!access) {
    throw new ConfigurationError(`${where}: access must be one of ${ACCESS_MODES.join(', ')}`);
  }
  if (raw.scope === undefined) {
    return { access };
  }
  if (raw.scope !== 'valid') {
    throw new ConfigurationError(`${where}: unsupported scope ${JSON.stringify(raw.scope)}`);
  }
  return { access, scope: 'valid' };
}

function toStringList(value: unknown, where: string): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigurationError(`${where} must be a list of names`);
  }
  return value;
}

export function builtinPrimitives(): PrimitiveDefinition[] {
  return parsePrimitiveDocument(builtinDocument, 'builtin primitives');
}

/** Later layers replace earlier definitions of the same primitive. */
export function mergePrimitives(...layers: Array<PrimitiveDefinition[]>): PrimitiveTable {
  const merged = new Map<string, PrimitiveDefinition>();
  for (const layer of layers) {
    for (const definition of layer) {
      merged.set(definition.name, definition);
    }
  }
  return new OrderedMap(merged);
}

/**
 * Reads the supplementary primitive documents matched by `patterns` and merges
 * them over the built-in table. Fails before any analysis when a pattern
 * matches nothing or a document cannot be read.
 */
export async function loadPrimitiveTable(patterns: string[] = [], cwd = process.cwd()): Promise<PrimitiveTable> {
  const layers: Array<PrimitiveDefinition[]> = [builtinPrimitives()];

  for (const pattern of patterns) {
    const files = (await globby(pattern, { cwd, absolute: true })).sort();
    if (files.length === 0) {
      throw new ConfigurationError(`No primitive definitions match "${pattern}"`);
    }
    for (const file of files) {
      log.debug(`loading primitive definitions from ${file}`);
      let document: unknown;
      try {
        document = JSON.parse(await fs.readFile(file, 'utf-8'));
      } catch (err) {
        throw new ConfigurationError(`Unable to read primitive definitions ${file}: ${errorMessage(err)}`);
      }
      layers.push(parsePrimitiveDocument(document, file));
    }
  }

  return mergePrimitives(...layers);
}
