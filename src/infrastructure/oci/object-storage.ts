import { randomUUID } from 'node:crypto';
import { extractStatus } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type { ImageContentType, StoredObjectRef } from '../../domain/types.js';

const log = logger.child({ module: 'object-storage' });

const STATUS_OK = 200;

/** Subset of the oci-objectstorage `ObjectStorageClient` the gateway calls. */
export interface ObjectStorageClient {
  putObject(request: {
    namespaceName: string;
    bucketName: string;
    objectName: string;
    putObjectBody: Buffer;
    contentLength: number;
    contentType: string;
  }): Promise<unknown>;
  createPreauthenticatedRequest(request: {
    namespaceName: string;
    bucketName: string;
    createPreauthenticatedRequestDetails: {
      name: string;
      accessType: string;
      bucketListingAction?: string;
      objectName?: string;
      timeExpires: Date;
    };
  }): Promise<{ preauthenticatedRequest?: { accessUri?: string; fullPath?: string } | null }>;
}

export interface ReadOnlyLinkResult {
  status: number;
  url: string | null;
}

export function buildImageObjectKey(prefix: string, fileName: string, id: string = randomUUID()): string {
  return `${prefix}/${id}-${fileName}`;
}

export class ObjectStorageGateway {
  constructor(
    private readonly client: ObjectStorageClient,
    private readonly namespace: string,
    private readonly bucket: string,
  ) {}

  ref(objectKey: string): StoredObjectRef {
    return { namespace: this.namespace, bucket: this.bucket, objectKey };
  }

  /** Returns the HTTP status of the upload; 200 on success. */
  async put(bytes: Buffer, contentType: ImageContentType, objectKey: string): Promise<number> {
    try {
      await this.client.putObject({
        namespaceName: this.namespace,
        bucketName: this.bucket,
        objectName: objectKey,
        putObjectBody: bytes,
        contentLength: bytes.length,
        contentType,
      });
    } catch (cause) {
      return this.statusOf(cause, { objectKey, operation: 'putObject' });
    }

    log.debug({ objectKey, bucket: this.bucket, sizeBytes: bytes.length }, 'Object uploaded');
    return STATUS_OK;
  }

  async createReadOnlyLink(objectKey: string, expiresAt: Date): Promise<ReadOnlyLinkResult> {
    let response: Awaited<ReturnType<ObjectStorageClient['createPreauthenticatedRequest']>>;
    try {
      response = await this.client.createPreauthenticatedRequest({
        namespaceName: this.namespace,
        bucketName: this.bucket,
        createPreauthenticatedRequestDetails: {
          name: `read-${objectKey.split('/').pop() ?? objectKey}`,
          accessType: 'ObjectRead',
          bucketListingAction: 'Deny',
          objectName: objectKey,
          timeExpires: expiresAt,
        },
      });
    } catch (cause) {
      return { status: this.statusOf(cause, { objectKey, operation: 'createPreauthenticatedRequest' }), url: null };
    }

    const url = response.preauthenticatedRequest?.fullPath || null;
    log.debug({ objectKey, expiresAt: expiresAt.toISOString(), hasUrl: url !== null }, 'Read-only link created');
    return { status: STATUS_OK, url };
  }

  /** @throws the original error when it carries no HTTP status */
  private statusOf(cause: unknown, ctx: { objectKey: string; operation: string }): number {
    const status = extractStatus(cause);
    if (status === undefined) throw cause;

    const details = cause instanceof Error ? cause.message : String(cause);
    log.warn({ ...ctx, bucket: this.bucket, status, details }, 'Object Storage request rejected');
    return status;
  }
}
