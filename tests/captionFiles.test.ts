import { afterEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { captionExists, deleteCaption, getCaptionPath, readCaption, writeCaption } from '../server/captionFiles';

const tempRoots: string[] = [];

async function makeTempDir(): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'captioner-caption-files-test-'));
  tempRoots.push(dir);
  return dir;
}

afterEach(async () => {
  await Promise.all(tempRoots.splice(0).map((entry) => rm(entry, { recursive: true, force: true })));
});

describe('getCaptionPath', () => {
  it('puts the caption next to the image by default', () => {
    expect(getCaptionPath('/data/set/photo.01.webp')).toBe(path.join('/data/set', 'photo.01.txt'));
  });

  it('uses the output folder when given', () => {
    expect(getCaptionPath('/data/set/photo.png', '/data/captions')).toBe(path.join('/data/captions', 'photo.txt'));
  });
});

describe('caption files', () => {
  it('writes, reads and deletes captions', async () => {
    const root = await makeTempDir();
    const imagePath = path.join(root, 'cat.png');

    expect(await captionExists(imagePath)).toBe(false);
    expect(await readCaption(imagePath)).toBe('');

    const captionPath = await writeCaption(imagePath, 'a cat on a sofa');
    expect(captionPath).toBe(path.join(root, 'cat.txt'));
    expect(await readFile(captionPath, 'utf8')).toBe('a cat on a sofa');
    expect(await captionExists(imagePath)).toBe(true);
    expect(await readCaption(imagePath)).toBe('a cat on a sofa');

    expect(await deleteCaption(imagePath)).toBe(true);
    expect(await deleteCaption(imagePath)).toBe(false);
    expect(await captionExists(imagePath)).toBe(false);
  });

  it('creates the output folder on write', async () => {
    const root = await makeTempDir();
    const outputDir = path.join(root, 'out', 'captions');

    const captionPath = await writeCaption(path.join(root, 'dog.jpg'), 'dog', outputDir);

    expect(captionPath).toBe(path.join(outputDir, 'dog.txt'));
    expect(await readCaption(path.join(root, 'dog.jpg'), outputDir)).toBe('dog');
  });

  it('overwrites an existing caption', async () => {
    const root = await makeTempDir();
    const imagePath = path.join(root, 'bird.gif');
    await writeFile(path.join(root, 'bird.txt'), 'old', 'utf8');

    await writeCaption(imagePath, 'new');
    expect(await readCaption(imagePath)).toBe('new');
  });

  it('wraps write failures as io errors', async () => {
    const root = await makeTempDir();
    const blocker = path.join(root, 'blocker');
    await writeFile(blocker, 'not a folder', 'utf8');

    await expect(writeCaption(path.join(root, 'a.png'), 'x', blocker)).rejects.toMatchObject({ code: 'io' });
  });
});
