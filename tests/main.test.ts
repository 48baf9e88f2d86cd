import { afterEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { parseCliArgs, resolveInitialFolder } from '../server/main';

const tempRoots: string[] = [];

afterEach(async () => {
  await Promise.all(tempRoots.splice(0).map((entry) => rm(entry, { recursive: true, force: true })));
});

describe('parseCliArgs', () => {
  it('defaults to opening the browser on the default port', () => {
    expect(parseCliArgs([], {})).toEqual({ folder: null, port: 4178, open: true });
  });

  it('reads the folder, port and browser flag', () => {
    expect(parseCliArgs(['./photos', '--port', '5000', '--no-open'], {})).toEqual({
      folder: path.resolve('./photos'),
      port: 5000,
      open: false
    });
    expect(parseCliArgs(['--port=5001', '/data/a', '/data/b'], {})).toEqual({
      folder: '/data/a',
      port: 5001,
      open: true
    });
  });

  it('takes the port from the environment and ignores invalid values', () => {
    expect(parseCliArgs([], { PORT: '6000' }).port).toBe(6000);
    expect(parseCliArgs(['--port', 'abc'], { PORT: '6000' }).port).toBe(6000);
    expect(parseCliArgs(['--port=70000'], {}).port).toBe(4178);
  });
});

describe('resolveInitialFolder', () => {
  it('keeps existing folders only', async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), 'captioner-main-test-'));
    tempRoots.push(root);
    const filePath = path.join(root, 'a.png');
    await writeFile(filePath, 'x');

    expect(await resolveInitialFolder(root)).toBe(root);
    expect(await resolveInitialFolder(filePath)).toBeNull();
    expect(await resolveInitialFolder(null)).toBeNull();
  });
});
