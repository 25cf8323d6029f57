import { describe, it, expect } from 'vitest';
import { ImageFetcher, fileNameFromUrl, resolveImageContentType } from '../../src/infrastructure/image-fetcher.js';
import { PNG_BYTES, createFetchFn } from '../helpers/fakes.js';

describe('fileNameFromUrl', () => {
  it('takes the last path segment', () => {
    expect(fileNameFromUrl('https://cdn.example.com/a/b/photo.png')).toBe('photo.png');
  });

  it('ignores query and fragment', () => {
    expect(fileNameFromUrl('https://cdn.example.com/photo.jpg?w=200#top')).toBe('photo.jpg');
  });

  it('decodes percent-encoding', () => {
    expect(fileNameFromUrl('https://cdn.example.com/my%20photo.png')).toBe('my photo.png');
  });

  it('keeps a malformed segment as-is', () => {
    expect(fileNameFromUrl('https://cdn.example.com/bad%E0.png')).toBe('bad%E0.png');
  });

  it('is empty for a trailing slash', () => {
    expect(fileNameFromUrl('https://cdn.example.com/images/')).toBe('');
  });
});

describe('resolveImageContentType', () => {
  it.each([
    ['photo.png', 'image/png'],
    ['photo.PNG', 'image/png'],
    ['photo.jpg', 'image/jpeg'],
    ['photo.jpeg', 'image/jpeg'],
  ])('maps %s to %s', (fileName, expected) => {
    expect(resolveImageContentType(fileName)).toBe(expected);
  });

  it.each(['photo.gif', 'photo', 'photo.png.txt', ''])('returns null for %j', (fileName) => {
    expect(resolveImageContentType(fileName)).toBeNull();
  });
});

describe('ImageFetcher.fetch', () => {
  it('sends browser-like headers and returns status, bytes and file name', async () => {
    const fetchFn = createFetchFn(200);
    const fetcher = new ImageFetcher(fetchFn);

    const file = await fetcher.fetch('https://cdn.example.com/photo.png');

    expect(file).toEqual({ status: 200, bytes: PNG_BYTES, fileName: 'photo.png' });
    const init = fetchFn.mock.calls[0]?.[1];
    expect(init?.headers?.Accept).toBe('*/*');
    expect(init?.headers?.['User-Agent']).toMatch(/^Mozilla\/5\.0/);
  });

  it('returns non-200 statuses without throwing', async () => {
    const file = await new ImageFetcher(createFetchFn(404, Buffer.from('not found'))).fetch('https://cdn.example.com/x.png');

    expect(file.status).toBe(404);
    expect(file.bytes.toString()).toBe('not found');
  });

  it('propagates transport errors', async () => {
    const fetchFn = createFetchFn();
    fetchFn.mockRejectedValue(new TypeError('fetch failed'));

    await expect(new ImageFetcher(fetchFn).fetch('https://cdn.example.com/x.png')).rejects.toThrow('fetch failed');
  });
});
