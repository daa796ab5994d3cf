import { RenderingUnavailable } from '../../models';
import { RenderCommand, renderDotFile } from '../renderer';

describe('renderDotFile', () => {
  const dotFile = '/work/prog.deps.dot';

  function recorder(failing: string[] = []) {
    const calls: string[][] = [];
    const run: RenderCommand = (command, args) => {
      calls.push([command, ...args]);
      const format = args[0].slice(2);
      if (failing.includes(format)) {
        throw new Error(`no ${format} support`);
      }
    };
    return { calls, run };
  }

  it('renders the first format that works', () => {
    const { calls, run } = recorder();

    expect(renderDotFile(dotFile, ['png', 'none'], run)).toEqual({
      format: 'png',
      outputPath: '/work/prog.deps.png',
      attempts: [],
    });
    expect(calls).toEqual([['dot', '-Tpng', dotFile, '-o', '/work/prog.deps.png']]);
  });

  it('falls through to later formats', () => {
    const { calls, run } = recorder(['png']);

    expect(renderDotFile(dotFile, ['png', 'svg'], run)).toEqual({
      format: 'svg',
      outputPath: '/work/prog.deps.svg',
      attempts: [{ format: 'png', reason: 'no png support' }],
    });
    expect(calls).toHaveLength(2);
  });

  it('stops quietly at the sentinel', () => {
    const { calls, run } = recorder(['png']);

    expect(renderDotFile(dotFile, ['png', 'none', 'svg'], run)).toEqual({
      attempts: [{ format: 'png', reason: 'no png support' }],
    });
    expect(calls).toHaveLength(1);
  });

  it('renders nothing without formats', () => {
    const { calls, run } = recorder();

    expect(renderDotFile(dotFile, [], run)).toEqual({ attempts: [] });
    expect(calls).toEqual([]);
  });

  it('reports every failed format when none works', () => {
    const { run } = recorder(['png', 'svg']);

    let error: unknown;
    try {
      renderDotFile(dotFile, ['png', 'svg'], run);
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(RenderingUnavailable);
    expect(error).toEqual(
      new RenderingUnavailable('Unable to render prog.deps.dot: png (no png support), svg (no svg support)')
    );
    expect(error instanceof RenderingUnavailable && error.attempts).toEqual([
      { format: 'png', reason: 'no png support' },
      { format: 'svg', reason: 'no svg support' },
    ]);
  });
});
