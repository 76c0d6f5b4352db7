// Image attachments: local files become base64 (or data URLs), remote URLs pass through

import { readFile } from 'fs/promises';
import path from 'path';
import { ImageEncodingError } from './errors.js';
import type { ImageReader } from './types.js';

const MIME_TYPES: Record<string, string> = {
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
  gif: 'image/gif',
  webp: 'image/webp',
};

export const MAX_IMAGE_BYTES = 100 * 1024 * 1024;

export const readImageFile: ImageReader = async (filePath) => readFile(filePath);

export function isRemoteImage(location: string): boolean {
  return location.startsWith('http://') || location.startsWith('https://');
}

export function imageMimeType(filePath: string): string {
  const extension = path.extname(filePath).slice(1).toLowerCase();
  return MIME_TYPES[extension] ?? 'image/jpeg';
}

export class ImageEncoder {
  private reader: ImageReader;

  constructor(reader: ImageReader = readImageFile) {
    this.reader = reader;
  }

  /**
   * Read a local image and return its bytes as base64.
   * @throws ImageEncodingError for unsupported extensions, unreadable or oversized files
   */
  async toBase64(filePath: string): Promise<string> {
    const extension = path.extname(filePath).slice(1).toLowerCase();
    if (!(extension in MIME_TYPES)) {
      throw new ImageEncodingError(
        `Unsupported image format: "${extension || filePath}". Supported: ${Object.keys(MIME_TYPES).join(', ')}`,
        filePath,
      );
    }

    let bytes: Uint8Array;
    try {
      bytes = await this.reader(filePath);
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ImageEncodingError(`Cannot read image ${filePath}: ${reason}`, filePath, { cause: error });
    }

    if (bytes.byteLength > MAX_IMAGE_BYTES) {
      throw new ImageEncodingError(
        `Image file too large: ${bytes.byteLength} bytes (max: ${MAX_IMAGE_BYTES} bytes)`,
        filePath,
      );
    }

    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
  }

  async toDataUrl(filePath: string): Promise<string> {
    const base64 = await this.toBase64(filePath);
    return `data:${imageMimeType(filePath)};base64,${base64}`;
  }

  // Ollama format: raw base64 for files, URLs unchanged
  async encodeAll(locations: string[]): Promise<string[]> {
    return Promise.all(locations.map((location) => (isRemoteImage(location) ? location : this.toBase64(location))));
  }

  // OpenAI format: data URLs for files, URLs unchanged
  async encodeAllAsDataUrls(locations: string[]): Promise<string[]> {
    return Promise.all(locations.map((location) => (isRemoteImage(location) ? location : this.toDataUrl(location))));
  }
}
