import { promises as fs } from 'node:fs';
import type { Stats } from 'node:fs';
import path from 'node:path';
import type { ImageItem, ScanMode } from '../src/types';
import { captionExists, getCaptionPath } from './captionFiles';
import { CaptionerError, toErrorMessage } from './errors';

const collator = new Intl.Collator(undefined, {
  numeric: true,
  sensitivity: 'base'
});

const IMAGE_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg', '.webp', '.gif']);

export function isSupportedImageExtension(extension: string): boolean {
  return IMAGE_EXTENSIONS.has(extension.toLowerCase());
}

export function buildDatasetSourceUrl(sourcePath: string, options: { thumb?: boolean } = {}): string {
  const base = `/dataset/image?path=${encodeURIComponent(sourcePath)}`;
  return options.thumb ? `${base}&thumb=1` : base;
}

export function naturalImageSort(a: ImageItem, b: ImageItem): number {
  const byDir = collator.compare(a.relDir, b.relDir);
  if (byDir !== 0) {
    return byDir;
  }

  const byName = collator.compare(a.baseName, b.baseName);
  if (byName !== 0) {
    return byName;
  }

  return collator.compare(a.ext, b.ext);
}

async function collectImageFiles(directory: string, recursive: boolean): Promise<string[]> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name);

    if (entry.isDirectory()) {
      if (recursive && !entry.name.startsWith('.')) {
        const nested = await collectImageFiles(fullPath, recursive);
        files.push(...nested);
      }
      continue;
    }

    if (!entry.isFile()) {
      continue;
    }

    if (isSupportedImageExtension(path.extname(entry.name))) {
      files.push(fullPath);
    }
  }

  return files;
}

export async function listImageFiles(folder: string, mode: ScanMode): Promise<string[]> {
  let stat: Stats;
  try {
    stat = await fs.stat(folder);
  } catch (error) {
    throw new CaptionerError('not_found', `Folder ${folder} is not readable: ${toErrorMessage(error)}`, { cause: error });
  }

  if (!stat.isDirectory()) {
    throw new CaptionerError('validation', `${folder} is not a folder.`);
  }

  try {
    return await collectImageFiles(folder, mode === 'recursive');
  } catch (error) {
    throw new CaptionerError('io', `Unable to scan ${folder}: ${toErrorMessage(error)}`, { cause: error });
  }
}

export async function scanImageFolder(folder: string, mode: ScanMode, outputDir?: string): Promise<ImageItem[]> {
  const root = path.resolve(folder);
  const files = await listImageFiles(root, mode);

  const items = await Promise.all(
    files.map(async (sourcePath) => {
      const ext = path.extname(sourcePath).toLowerCase();
      const relPath = path.relative(root, sourcePath);
      const relDirRaw = path.dirname(relPath);
      const relDir = relDirRaw === '.' ? '' : relDirRaw;
      const baseName = path.basename(sourcePath, path.extname(sourcePath));

      return {
        id: sourcePath,
        sourcePath,
        sourceUrl: buildDatasetSourceUrl(sourcePath),
        thumbUrl: buildDatasetSourceUrl(sourcePath, { thumb: true }),
        relDir,
        baseName,
        ext,
        captionPath: getCaptionPath(sourcePath, outputDir),
        hasCaption: await captionExists(sourcePath, outputDir)
      } satisfies ImageItem;
    })
  );

  items.sort(naturalImageSort);
  return items;
}
