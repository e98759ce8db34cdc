import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { InputError } from '@/plan/errors.ts';
import type { ChartImage, ChartMediaType } from '@/data-sources/types.ts';

const MEDIA_TYPES: Record<string, ChartMediaType> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
};

const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

const SIGNATURES: Record<ChartMediaType, { label: string; bytes: readonly number[] }> = {
  'image/png': { label: 'PNG', bytes: [0x89, 0x50, 0x4e, 0x47] },
  'image/jpeg': { label: 'JPEG', bytes: [0xff, 0xd8, 0xff] },
};

const hasSignature = (data: string, mediaType: ChartMediaType): boolean => {
  const head = Buffer.from(data.slice(0, 8), 'base64');
  return SIGNATURES[mediaType].bytes.every((byte, i) => head[i] === byte);
};

export const mediaTypeFor = (fileName: string): ChartMediaType | null =>
  MEDIA_TYPES[extname(fileName).toLowerCase()] ?? null;

export const createChartImage = (fileName: string, base64: string): ChartImage => {
  const issues: string[] = [];
  const mediaType = mediaTypeFor(fileName);
  if (!mediaType) issues.push(`chart must be a .png, .jpg or .jpeg file, got "${fileName}"`);

  const data = base64.replace(/\s+/g, '');
  if (data.length === 0) {
    issues.push('chart image is empty');
  } else if (data.length % 4 !== 0 || !BASE64.test(data)) {
    issues.push('chart image data is not valid base64');
  } else if (mediaType && !hasSignature(data, mediaType)) {
    issues.push(`chart image data is not a ${SIGNATURES[mediaType].label} image`);
  }

  if (!mediaType || issues.length > 0) throw new InputError(issues);
  return Object.freeze({ fileName: basename(fileName), mediaType, data });
};

export const loadChartImage = async (path: string): Promise<ChartImage> => {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new InputError(`cannot read chart image ${path}: ${message}`);
  }
  return createChartImage(path, bytes.toString('base64'));
};
