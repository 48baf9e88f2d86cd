import { promises as fs } from 'node:fs';
import path from 'node:path';
import { wrapIoError } from './errors';

export function getCaptionPath(imagePath: string, outputDir?: string): string {
  const extension = path.extname(imagePath);
  const fileName = `${path.basename(imagePath, extension)}.txt`;

  if (outputDir) {
    return path.join(path.resolve(outputDir), fileName);
  }

  return path.join(path.dirname(imagePath), fileName);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function captionExists(imagePath: string, outputDir?: string): Promise<boolean> {
  try {
    const stat = await fs.stat(getCaptionPath(imagePath, outputDir));
    return stat.isFile();
  } catch {
    return false;
  }
}

export async function readCaption(imagePath: string, outputDir?: string): Promise<string> {
  const captionPath = getCaptionPath(imagePath, outputDir);

  try {
    return await fs.readFile(captionPath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return '';
    }

    throw wrapIoError(error, 'read', captionPath);
  }
}

export async function writeCaption(imagePath: string, text: string, outputDir?: string): Promise<string> {
  const captionPath = getCaptionPath(imagePath, outputDir);

  try {
    await fs.mkdir(path.dirname(captionPath), { recursive: true });
    await fs.writeFile(captionPath, text, 'utf8');
  } catch (error) {
    throw wrapIoError(error, 'write', captionPath);
  }

  return captionPath;
}

export async function deleteCaption(imagePath: string, outputDir?: string): Promise<boolean> {
  const captionPath = getCaptionPath(imagePath, outputDir);

  try {
    await fs.unlink(captionPath);
    return true;
  } catch (error) {
    if (isMissingFile(error)) {
      return false;
    }

    throw wrapIoError(error, 'delete', captionPath);
  }
}
