import { randomUUID } from 'node:crypto';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { textAnomalyInput, type TextAnomalyInput } from '../../domain/schemas.js';
import { ACCESS_LINK_TTL_MS, type AppConfig } from '../../infrastructure/config.js';
import { createInvocationLogger, logger } from '../../infrastructure/logger.js';
import { ImageFetcher, type FetchFn } from '../../infrastructure/image-fetcher.js';
import { ObjectStorageGateway, buildImageObjectKey } from '../../infrastructure/oci/object-storage.js';
import { TextDetector } from '../../infrastructure/oci/vision.js';
import { DocumentGeneratorClient } from '../../infrastructure/oci/document-generator.js';
import type { OciClients } from '../../infrastructure/oci/client.js';
import type { PipelineStage } from '../../domain/types.js';
import { fetchImage } from '../image/index.js';
import { evaluateAnomalies } from '../anomaly/index.js';
import { buildReportData, buildReportObjectKey, buildReportPayload, generateReport } from '../report/index.js';
import type { PipelineDeps, PipelineResult } from './types.js';

export type { PipelineDeps, PipelineResult } from './types.js';

const STATUS_OK = 200;

export const NO_DATA_MESSAGE = 'No data provided';

function isMissing(body: unknown): boolean {
  if (body === undefined || body === null || body === '') return true;
  return typeof body === 'object' && !Array.isArray(body) && Object.keys(body).length === 0;
}

export function parseInput(body: unknown): Result<TextAnomalyInput, AppError> {
  if (isMissing(body)) {
    return err(createAppError(ErrorCode.INPUT_MISSING, NO_DATA_MESSAGE, 'parsing_input'));
  }

  const parsed = textAnomalyInput.safeParse(body);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    return err(createAppError(ErrorCode.INPUT_INVALID, `Invalid request body: ${details}`, 'parsing_input', details));
  }
  return ok(parsed.data);
}

function failure(error: AppError): PipelineResult {
  return { kind: 'failure', error };
}

export class TextAnomalyPipeline {
  private readonly generateId: () => string;
  private readonly now: () => Date;

  constructor(private readonly deps: PipelineDeps) {
    this.generateId = deps.generateId ?? randomUUID;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Fetch, store, detect, evaluate and, when some word is below the confidence
   * threshold, generate the PDF report and a one-hour read-only link to it.
   *
   * Anticipated stage failures come back as `failure` results. Anything else
   * (including text detection errors) is logged with its stage and rethrown.
   */
  async run(body: unknown): Promise<PipelineResult> {
    const { fetcher, storage, detector, documentGenerator } = this.deps;
    const invocationId = this.generateId();
    let log = createInvocationLogger(invocationId);
    let stage: PipelineStage = 'parsing_input';

    try {
      const input = parseInput(body);
      if (!input.ok) {
        log.error({ errorCode: input.error.code, stage }, input.error.message);
        return failure(input.error);
      }
      const { url } = input.value;
      log = createInvocationLogger(invocationId, url);
      log.info({ step: stage }, 'Request accepted');

      stage = 'fetching_image';
      const fetched = await fetchImage(fetcher, url);
      if (!fetched.ok) return failure(fetched.error);
      const { bytes, fileName, contentType } = fetched.value;

      stage = 'storing_image';
      const image = storage.ref(buildImageObjectKey(this.deps.objectKeyPrefix, fileName, invocationId));
      const putStatus = await storage.put(bytes, contentType, image.objectKey);
      if (putStatus !== STATUS_OK) {
        const message = `Image ${image.objectKey} storing in Bucket ${image.bucket} failed with status code ${putStatus}.`;
        log.error({ errorCode: ErrorCode.STORAGE_UPLOAD_FAILED, stage, status: putStatus }, message);
        return failure(createAppError(ErrorCode.STORAGE_UPLOAD_FAILED, message, stage));
      }
      log.info({ step: stage, objectKey: image.objectKey, bucket: image.bucket }, 'Image stored');

      stage = 'detecting_text';
      const words = await detector.detect(image);

      stage = 'evaluating_anomalies';
      const verdict = evaluateAnomalies(words, this.deps.confidenceThreshold);
      if (verdict.clear) {
        const message = `All Words are clear in Image: "${image.objectKey}" from Bucket: "${image.bucket}" in Namespace: "${image.namespace}"`;
        log.info({ step: stage, wordCount: words.length }, `${message}. Processing complete`);
        return { kind: 'no_anomaly', message, image };
      }
      log.info(
        { step: stage, wordCount: words.length, anomalousCount: verdict.anomalousWords.length },
        'Anomalies found, generating report',
      );

      stage = 'generating_report';
      const report = storage.ref(buildReportObjectKey(image.objectKey));
      const payload = buildReportPayload(buildReportData(words, image, contentType), report, this.deps.reportAssets);
      const generated = await generateReport(documentGenerator, payload, report);
      if (!generated.ok) return failure(generated.error);

      stage = 'creating_access_link';
      const expiresAt = new Date(this.now().getTime() + ACCESS_LINK_TTL_MS);
      const link = await storage.createReadOnlyLink(report.objectKey, expiresAt);
      if (link.status !== STATUS_OK) {
        const message = `PAR generation error. Status code: ${link.status}`;
        log.error({ errorCode: ErrorCode.ACCESS_LINK_FAILED, stage, status: link.status }, message);
        return failure(createAppError(ErrorCode.ACCESS_LINK_FAILED, message, stage));
      }
      if (link.url === null) {
        const message = 'PAR generation returned no access URL';
        log.error({ errorCode: ErrorCode.ACCESS_LINK_FAILED, stage }, message);
        return failure(createAppError(ErrorCode.ACCESS_LINK_FAILED, message, stage));
      }

      log.info({ step: stage, objectKey: report.objectKey, expiresAt: expiresAt.toISOString() }, 'Report ready');
      return { kind: 'report_ready', inputUrl: url, image, report, accessLink: { url: link.url, expiresAt } };
    } catch (cause) {
      log.error({ stage, err: cause instanceof Error ? cause.message : String(cause) }, 'Unhandled pipeline fault');
      throw cause;
    }
  }
}

export function createPipeline(config: AppConfig, clients: OciClients, fetchFn?: FetchFn): TextAnomalyPipeline {
  logger.debug({ bucket: config.storage.bucket, prefix: config.storage.prefix }, 'Assembling pipeline');

  return new TextAnomalyPipeline({
    fetcher: new ImageFetcher(fetchFn),
    storage: new ObjectStorageGateway(clients.objectStorage, config.storage.namespace, config.storage.bucket),
    detector: new TextDetector(clients.vision, config.compartmentId),
    documentGenerator: new DocumentGeneratorClient(clients.functionsInvoke, config.documentGenerator.functionId),
    objectKeyPrefix: config.storage.prefix,
    confidenceThreshold: config.confidenceThreshold,
    reportAssets: {
      templateObject: config.documentGenerator.templateObject,
      ...(config.documentGenerator.fontsObject !== undefined && { fontsObject: config.documentGenerator.fontsObject }),
    },
  });
}
