import type { ImageContentType, Point } from '../../domain/types.js';

export interface ReportWordEntry {
  word: string;
  /** Percentage, one decimal */
  confidence: number;
  corner1: Point;
  corner3: Point;
}

export interface ReportData {
  image_with_anomalies: {
    source: 'OBJECT_STORAGE';
    objectName: string;
    namespace: string;
    bucketName: string;
    mediaType: ImageContentType;
    height: string;
  };
  words: ReportWordEntry[];
}

export interface ObjectStorageLocation {
  source: 'OBJECT_STORAGE';
  namespace: string;
  bucketName: string;
  objectName: string;
}

export interface ReportPayload {
  requestType: 'SINGLE';
  tagSyntax: 'DOCGEN_1_0';
  data: { source: 'INLINE'; content: ReportData };
  template: ObjectStorageLocation & { contentType: string };
  output: Omit<ObjectStorageLocation, 'source'> & { target: 'OBJECT_STORAGE'; contentType: 'application/pdf' };
  fonts?: ObjectStorageLocation;
}

export interface ReportAssets {
  templateObject: string;
  fontsObject?: string;
}
