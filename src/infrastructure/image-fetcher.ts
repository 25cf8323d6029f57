import { extname } from 'node:path';
import { logger } from './logger.js';
import type { ImageContentType } from '../domain/types.js';

const log = logger.child({ module: 'image-fetcher' });

const REQUEST_HEADERS = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  Accept: '*/*',
} as const;

const CONTENT_TYPES_BY_EXTENSION: Record<string, ImageContentType> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
};

export type FetchFn = (input: string, init?: { headers?: Record<string, string> }) => Promise<{
  status: number;
  arrayBuffer(): Promise<ArrayBuffer>;
}>;

export interface RemoteFile {
  status: number;
  bytes: Buffer;
  fileName: string;
}

export function fileNameFromUrl(url: string): string {
  const segments = new URL(url).pathname.split('/');
  const last = segments[segments.length - 1] ?? '';
  try {
    return decodeURIComponent(last);
  } catch {
    // Malformed percent-encoding; keep the raw segment
    return last;
  }
}

export function resolveImageContentType(fileName: string): ImageContentType | null {
  return CONTENT_TYPES_BY_EXTENSION[extname(fileName).toLowerCase()] ?? null;
}

export class ImageFetcher {
  private readonly fetchFn: FetchFn;

  constructor(fetchFn: FetchFn = globalThis.fetch) {
    this.fetchFn = fetchFn;
  }

  async fetch(url: string): Promise<RemoteFile> {
    const fileName = fileNameFromUrl(url);
    const startTime = Date.now();

    const response = await this.fetchFn(url, { headers: { ...REQUEST_HEADERS } });
    const bytes = Buffer.from(await response.arrayBuffer());

    log.debug(
      { url, status: response.status, sizeBytes: bytes.length, latencyMs: Date.now() - startTime },
      'Remote file fetched',
    );
    return { status: response.status, bytes, fileName };
  }
}
