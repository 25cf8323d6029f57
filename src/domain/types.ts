export const PIPELINE_STAGES = [
  'parsing_input',
  'fetching_image',
  'storing_image',
  'detecting_text',
  'evaluating_anomalies',
  'generating_report',
  'creating_access_link',
] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

export const IMAGE_CONTENT_TYPES = ['image/jpeg', 'image/png'] as const;

export type ImageContentType = (typeof IMAGE_CONTENT_TYPES)[number];

export interface FetchedImage {
  bytes: Buffer;
  fileName: string;
  contentType: ImageContentType;
}

export interface StoredObjectRef {
  namespace: string;
  bucket: string;
  objectKey: string;
}

export interface Point {
  x: number;
  y: number;
}

export interface DetectedWord {
  text: string;
  confidence: number;
  boundingBox: {
    topLeft: Point;
    bottomRight: Point;
  };
}

export interface AnomalyVerdict {
  clear: boolean;
  anomalousWords: DetectedWord[];
}

export interface AccessLink {
  url: string;
  expiresAt: Date;
}
