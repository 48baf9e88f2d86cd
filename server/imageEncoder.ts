import path from 'node:path';
import sharp from 'sharp';
import type { SharpOptions } from 'sharp';
import { CaptionerError, toErrorMessage } from './errors';

export interface EncodedImage {
  data: Buffer;
  mimeType: 'image/png';
  width: number;
  height: number;
}

function sharpOptionsForPath(imagePath: string): SharpOptions | undefined {
  if (path.extname(imagePath).toLowerCase() === '.gif') {
    return {
      animated: true,
      pages: 1,
      page: 0
    };
  }

  return undefined;
}

export async function encodeImageForInference(imagePath: string): Promise<EncodedImage> {
  try {
    const { data, info } = await sharp(imagePath, sharpOptionsForPath(imagePath))
      .rotate()
      .removeAlpha()
      .png()
      .toBuffer({ resolveWithObject: true });

    return {
      data,
      mimeType: 'image/png',
      width: info.width,
      height: info.height
    };
  } catch (error) {
    throw new CaptionerError('image', `Unable to decode ${path.basename(imagePath)}: ${toErrorMessage(error)}`, {
      cause: error
    });
  }
}

export function toBase64(image: EncodedImage): string {
  return image.data.toString('base64');
}

export function toDataUri(image: EncodedImage): string {
  return `data:${image.mimeType};base64,${toBase64(image)}`;
}

export async function renderThumbnail(imagePath: string, size: number): Promise<Buffer> {
  return sharp(imagePath, sharpOptionsForPath(imagePath))
    .rotate()
    .resize({
      width: size,
      height: size,
      fit: 'inside',
      withoutEnlargement: true
    })
    .webp({ quality: 80 })
    .toBuffer();
}
