import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';
import { resolveImageContentType, type ImageFetcher } from '../../infrastructure/image-fetcher.js';
import type { FetchedImage } from '../../domain/types.js';

const STATUS_OK = 200;

export async function fetchImage(
  fetcher: ImageFetcher,
  url: string,
): Promise<Result<FetchedImage, AppError>> {
  const log = logger.child({ step: 'fetching_image', url });

  const remote = await fetcher.fetch(url);

  if (remote.status !== STATUS_OK) {
    const message = `Failed to retrieve the file from '${url}'. Status code: ${remote.status}`;
    log.error({ errorCode: ErrorCode.IMAGE_FETCH_FAILED, status: remote.status }, message);
    return err(createAppError(ErrorCode.IMAGE_FETCH_FAILED, message, 'fetching_image'));
  }

  const contentType = resolveImageContentType(remote.fileName);
  if (contentType === null) {
    const message = `Failed to retrieve a jpeg or png image from '${url}'.`;
    log.error({ errorCode: ErrorCode.IMAGE_UNSUPPORTED_TYPE, fileName: remote.fileName }, message);
    return err(createAppError(ErrorCode.IMAGE_UNSUPPORTED_TYPE, message, 'fetching_image', remote.fileName));
  }

  log.info({ fileName: remote.fileName, contentType, sizeBytes: remote.bytes.length }, 'Image fetched');
  return ok({ bytes: remote.bytes, fileName: remote.fileName, contentType });
}
