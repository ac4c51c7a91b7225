import path from 'node:path';
import { readFile } from 'node:fs/promises';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createArray, type NDArray } from '../../src/ndplot/arrays/NDArray.ts';
import { runCli, type CliDependencies } from '../../src/ndplot/cli/dispatcher.ts';
import { main } from '../../src/ndplot/main.ts';
import { FileLoadError } from '../../src/ndplot/utils/errors.ts';
import { makeTempDir, npyFloat64, removeTempDir, writeFixture } from '../helpers/npy.ts';

const sample = createArray([3], 'float64', Float64Array.from([1, 2, 3]));

const makeDeps = (array: NDArray = sample) => ({
  deserializeArray: vi.fn<CliDependencies['deserializeArray']>().mockResolvedValue(array),
  renderAsImage: vi.fn<CliDependencies['renderAsImage']>().mockResolvedValue(undefined),
  renderAsLine: vi.fn<CliDependencies['renderAsLine']>().mockResolvedValue(undefined),
  renderAsScatter: vi.fn<CliDependencies['renderAsScatter']>().mockResolvedValue(undefined)
});

const RENDERERS = {
  image: 'renderAsImage',
  line: 'renderAsLine',
  scatter: 'renderAsScatter'
} as const;

describe('runCli', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it.each(['image', 'line', 'scatter'] as const)('loads the file once and renders it with %s', async mode => {
    const deps = makeDeps();

    await expect(runCli([mode, 'data.arr'], deps)).resolves.toBe(0);

    expect(deps.deserializeArray).toHaveBeenCalledTimes(1);
    expect(deps.deserializeArray).toHaveBeenCalledWith('data.arr');
    for (const [other, renderer] of Object.entries(RENDERERS)) {
      expect(deps[renderer]).toHaveBeenCalledTimes(other === mode ? 1 : 0);
    }
    expect(deps[RENDERERS[mode]].mock.calls[0][0]).toBe(sample);
  });

  it('passes the parsed options to the renderer', async () => {
    const deps = makeDeps();

    await runCli(['image', 'a.npy', '-c', 'viridis', '-o', 'a.png'], deps);

    expect(deps.renderAsImage).toHaveBeenCalledWith(
      sample,
      expect.objectContaining({ colormap: 'viridis', output: 'a.png', mode: 'magnitude' })
    );
  });

  it('hands the loaded values of `line data.arr` to the line renderer', async () => {
    const deps = makeDeps();

    await runCli(['line', 'data.arr'], deps);

    const [array] = deps.renderAsLine.mock.calls[0];
    expect(array.shape).toEqual([3]);
    expect(Array.from(array.data)).toEqual([1, 2, 3]);
  });

  it('prints help and touches nothing without arguments', async () => {
    const deps = makeDeps();

    await expect(runCli([], deps)).resolves.toBe(0);

    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Usage: ndplot [options] [command]'));
    expect(deps.deserializeArray).not.toHaveBeenCalled();
  });

  it('prints help for --help', async () => {
    const deps = makeDeps();

    await expect(runCli(['--help'], deps)).resolves.toBe(0);

    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Examples:'));
    expect(deps.deserializeArray).not.toHaveBeenCalled();
  });

  it('reports usage errors with exit code 2 before loading anything', async () => {
    const deps = makeDeps();

    await expect(runCli(['image'], deps)).resolves.toBe(2);

    expect(deps.deserializeArray).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining("missing required argument 'filename'"));
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining("Run 'ndplot --help' for usage information"));
  });

  it('lets load failures propagate without rendering', async () => {
    const deps = makeDeps();
    const failure = new FileLoadError('missing.arr', 'file does not exist');
    deps.deserializeArray.mockRejectedValue(failure);

    await expect(runCli(['image', 'missing.arr'], deps)).rejects.toBe(failure);

    expect(deps.renderAsImage).not.toHaveBeenCalled();
  });

  it('behaves the same on repeated runs', async () => {
    const deps = makeDeps();

    await runCli(['scatter', 'p.npy'], deps);
    await runCli(['scatter', 'p.npy'], deps);

    expect(deps.deserializeArray.mock.calls).toEqual([['p.npy'], ['p.npy']]);
    expect(deps.renderAsScatter.mock.calls[1]).toEqual(deps.renderAsScatter.mock.calls[0]);
  });
});

describe('main', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('returns 1 and reports the path when the file cannot be loaded', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const missing = path.join(dir, 'missing.arr');

    await expect(main(['image', missing])).resolves.toBe(1);

    expect(error).toHaveBeenCalledWith(
      expect.stringContaining(`Cannot load array from '${missing}': file does not exist`)
    );
  });

  it('returns 1 when the array cannot be drawn', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const file = await writeFixture(dir, 'vector.npy', npyFloat64([1, 2, 3]));

    await expect(main(['image', file])).resolves.toBe(1);

    expect(error).toHaveBeenCalledWith(
      expect.stringContaining('Image plot needs an array with at least 2 dimensions, got shape (3)')
    );
  });

  it('loads, renders and writes a real file end to end', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const file = await writeFixture(dir, 'data.arr', npyFloat64([1, 2, 3]));
    const output = path.join(dir, 'line.svg');

    await expect(main(['line', file, '-o', output])).resolves.toBe(0);

    const svg = await readFile(output, 'utf8');
    expect(svg.match(/<path /g)).toHaveLength(1);
  });

  it('returns the usage exit code unchanged', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    await expect(main(['line', 'a.npy', 'b.npy'])).resolves.toBe(2);
  });
});
