import fs from 'fs';
import os from 'os';
import path from 'path';

import { RenderCommand } from '../../export';
import { log } from '../../io';
import { ConfigurationError, LogLevel, RenderingUnavailable } from '../../models';
import { fixturePath } from '../../__fixtures__/programs';
import { generateGraphs } from './generate';

describe('generateGraphs', () => {
  const source = fixturePath('basic_routing.json');
  let genDir: string;
  let rendered: string[];

  const render: RenderCommand = (_, args) => {
    rendered.push(args[args.length - 1]);
  };
  const failingRender: RenderCommand = () => {
    throw new Error('dot: command not found');
  };

  beforeAll(() => {
    log.setLevel(LogLevel.none);
  });

  afterAll(() => {
    log.setLevel(LogLevel.info);
  });

  beforeEach(() => {
    genDir = fs.mkdtempSync(path.join(os.tmpdir(), 'p4graphs-generate-'));
    rendered = [];
  });

  afterEach(() => {
    fs.rmSync(genDir, { recursive: true, force: true });
  });

  it('writes and renders every graph kind', async () => {
    const result = await generateGraphs(source, { genDir, format: ['svg'] }, { render });

    expect(result.outputs).toEqual([
      {
        kind: 'parser',
        dotPath: path.join(genDir, 'basic_routing.parser.dot'),
        renderedPath: path.join(genDir, 'basic_routing.parser.svg'),
      },
      {
        kind: 'tables',
        dotPath: path.join(genDir, 'basic_routing.tables.dot'),
        renderedPath: path.join(genDir, 'basic_routing.tables.svg'),
      },
      {
        kind: 'deps',
        dotPath: path.join(genDir, 'basic_routing.deps.dot'),
        renderedPath: path.join(genDir, 'basic_routing.deps.svg'),
      },
    ]);
    expect(rendered).toEqual(result.outputs.map(output => output.renderedPath));
    expect(result.analysis?.stageCount).toBe(4);
    expect(fs.readFileSync(path.join(genDir, 'basic_routing.deps.dot'), 'utf-8').split('\n')[1]).toBe(
      '  label="basic_routing: 4 stages";'
    );
  });

  it('generates only the selected kinds', async () => {
    const result = await generateGraphs(
      source,
      { genDir, deps: true, splitMatchActionEvents: true, format: ['none'] },
      { render }
    );

    expect(result.outputs.map(output => output.kind)).toEqual(['deps']);
    expect(result.analysis?.mode).toBe('fine');
    expect(rendered).toEqual([]);
    expect(fs.readdirSync(genDir)).toEqual(['basic_routing.deps.dot']);
  });

  it('keeps the DOT files when rendering fails', async () => {
    const result = await generateGraphs(source, { genDir, format: ['png'] }, { render: failingRender });

    expect(result.outputs.map(output => output.error instanceof RenderingUnavailable)).toEqual([true, true, true]);
    expect(fs.readdirSync(genDir).sort()).toEqual([
      'basic_routing.deps.dot',
      'basic_routing.parser.dot',
      'basic_routing.tables.dot',
    ]);
  });

  it('rejects a missing destination directory', async () => {
    const missing = path.join(genDir, 'missing');

    await expect(generateGraphs(source, { genDir: missing }, { render })).rejects.toThrow(
      new ConfigurationError(`${missing} is not a directory`)
    );
  });

  it('rejects a missing source', async () => {
    const absent = path.join(genDir, 'absent.json');

    await expect(generateGraphs(absent, { genDir }, { render })).rejects.toThrow(
      new ConfigurationError(`${absent} is not a file`)
    );
  });

  it('rejects inconsistent flags before writing anything', async () => {
    await expect(generateGraphs(source, { genDir, criticalPathOnly: true }, { render })).rejects.toThrow(
      ConfigurationError
    );
    expect(fs.readdirSync(genDir)).toEqual([]);
  });
});
