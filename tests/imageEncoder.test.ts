import { afterEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import sharp from 'sharp';
import { encodeImageForInference, renderThumbnail, toDataUri } from '../server/imageEncoder';

const tempRoots: string[] = [];

async function makeTempDir(): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'captioner-encoder-test-'));
  tempRoots.push(dir);
  return dir;
}

afterEach(async () => {
  await Promise.all(tempRoots.splice(0).map((entry) => rm(entry, { recursive: true, force: true })));
});

async function writeImage(filePath: string, width: number, height: number, channels: 3 | 4): Promise<void> {
  const background = channels === 4 ? { r: 200, g: 40, b: 40, alpha: 0.5 } : { r: 40, g: 200, b: 40 };
  const image = sharp({ create: { width, height, channels, background } });
  const extension = path.extname(filePath);
  const output = extension === '.webp' ? image.webp() : extension === '.jpg' ? image.jpeg() : image.png();
  await output.toFile(filePath);
}

describe('encodeImageForInference', () => {
  it('re-encodes images as opaque PNG', async () => {
    const root = await makeTempDir();
    const imagePath = path.join(root, 'alpha.webp');
    await writeImage(imagePath, 32, 24, 4);

    const encoded = await encodeImageForInference(imagePath);
    const metadata = await sharp(encoded.data).metadata();

    expect(encoded.mimeType).toBe('image/png');
    expect([encoded.width, encoded.height]).toEqual([32, 24]);
    expect(metadata.format).toBe('png');
    expect(metadata.hasAlpha).toBe(false);
  });

  it('reports undecodable files as image errors', async () => {
    const root = await makeTempDir();
    const imagePath = path.join(root, 'broken.png');
    await writeFile(imagePath, 'not an image', 'utf8');

    await expect(encodeImageForInference(imagePath)).rejects.toMatchObject({ code: 'image' });
    await expect(encodeImageForInference(imagePath)).rejects.toThrow(/^Unable to decode broken\.png: /);
  });
});

describe('toDataUri', () => {
  it('prefixes base64 data with the mime type', () => {
    const uri = toDataUri({ data: Buffer.from('abc'), mimeType: 'image/png', width: 1, height: 1 });
    expect(uri).toBe('data:image/png;base64,YWJj');
  });
});

describe('renderThumbnail', () => {
  it('fits inside the requested size without enlarging', async () => {
    const root = await makeTempDir();
    const largePath = path.join(root, 'large.jpg');
    const smallPath = path.join(root, 'small.png');
    await writeImage(largePath, 400, 200, 3);
    await writeImage(smallPath, 40, 30, 3);

    const large = await sharp(await renderThumbnail(largePath, 160)).metadata();
    const small = await sharp(await renderThumbnail(smallPath, 160)).metadata();

    expect([large.format, large.width, large.height]).toEqual(['webp', 160, 80]);
    expect([small.width, small.height]).toEqual([40, 30]);
  });
});
