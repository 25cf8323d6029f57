import type { DetectedWord, ImageContentType, Point, StoredObjectRef } from '../../domain/types.js';
import type { ObjectStorageLocation, ReportAssets, ReportData, ReportPayload, ReportWordEntry } from './types.js';

const DOCX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
const IMAGE_DISPLAY_HEIGHT = '450px';

// Number.EPSILON nudge keeps 1.005 -> 1.01 instead of 1.00
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round((value + Math.sign(value) * Number.EPSILON) * factor) / factor;
}

export function toPercentage(confidence: number): number {
  return roundTo(confidence * 100, 1);
}

function roundPoint(point: Point): Point {
  return { x: roundTo(point.x, 2), y: roundTo(point.y, 2) };
}

function toWordEntry(word: DetectedWord): ReportWordEntry {
  return {
    word: word.text,
    confidence: toPercentage(word.confidence),
    corner1: roundPoint(word.boundingBox.topLeft),
    corner3: roundPoint(word.boundingBox.bottomRight),
  };
}

export function buildReportData(
  words: readonly DetectedWord[],
  image: StoredObjectRef,
  contentType: ImageContentType,
): ReportData {
  return {
    image_with_anomalies: {
      source: 'OBJECT_STORAGE',
      objectName: image.objectKey,
      namespace: image.namespace,
      bucketName: image.bucket,
      mediaType: contentType,
      height: IMAGE_DISPLAY_HEIGHT,
    },
    words: words.map(toWordEntry),
  };
}

/** `prefix/id-photo.png` -> `prefix/id-photo.pdf` */
export function buildReportObjectKey(imageObjectKey: string): string {
  const slash = imageObjectKey.lastIndexOf('/');
  const dot = imageObjectKey.lastIndexOf('.');
  const stem = dot > slash + 1 ? imageObjectKey.slice(0, dot) : imageObjectKey;
  return `${stem}.pdf`;
}

export function buildReportPayload(
  data: ReportData,
  report: StoredObjectRef,
  assets: ReportAssets,
): ReportPayload {
  const location = { namespace: report.namespace, bucketName: report.bucket };
  const fonts: ObjectStorageLocation | undefined =
    assets.fontsObject !== undefined
      ? { source: 'OBJECT_STORAGE', ...location, objectName: assets.fontsObject }
      : undefined;

  return {
    requestType: 'SINGLE',
    tagSyntax: 'DOCGEN_1_0',
    data: { source: 'INLINE', content: data },
    template: {
      source: 'OBJECT_STORAGE',
      ...location,
      objectName: assets.templateObject,
      contentType: DOCX_CONTENT_TYPE,
    },
    output: {
      target: 'OBJECT_STORAGE',
      ...location,
      objectName: report.objectKey,
      contentType: 'application/pdf',
    },
    ...(fonts !== undefined && { fonts }),
  };
}
