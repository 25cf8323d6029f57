import type { AppError } from '../../domain/errors.js';
import type { AccessLink, StoredObjectRef } from '../../domain/types.js';
import type { ImageFetcher } from '../../infrastructure/image-fetcher.js';
import type { ObjectStorageGateway } from '../../infrastructure/oci/object-storage.js';
import type { TextDetector } from '../../infrastructure/oci/vision.js';
import type { DocumentGeneratorClient } from '../../infrastructure/oci/document-generator.js';
import type { ReportAssets } from '../report/types.js';

export type PipelineResult =
  | { kind: 'no_anomaly'; message: string; image: StoredObjectRef }
  | { kind: 'report_ready'; inputUrl: string; image: StoredObjectRef; report: StoredObjectRef; accessLink: AccessLink }
  | { kind: 'failure'; error: AppError };

export interface PipelineDeps {
  fetcher: ImageFetcher;
  storage: ObjectStorageGateway;
  detector: TextDetector;
  documentGenerator: DocumentGeneratorClient;
  objectKeyPrefix: string;
  confidenceThreshold: number;
  reportAssets: ReportAssets;
  /** Per-invocation id, also embedded in object keys. Defaults to a random UUID. */
  generateId?: () => string;
  now?: () => Date;
}
