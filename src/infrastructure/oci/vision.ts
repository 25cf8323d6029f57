import { analyzeImageResultSchema } from '../../domain/schemas.js';
import { logger } from '../logger.js';
import type { DetectedWord, StoredObjectRef } from '../../domain/types.js';

const log = logger.child({ module: 'vision' });

/** Subset of the oci-aivision `AIServiceVisionClient` the detector calls. */
export interface VisionClient {
  analyzeImage(request: {
    analyzeImageDetails: {
      features: Array<{ featureType: string }>;
      image: {
        source: string;
        namespaceName: string;
        bucketName: string;
        objectName: string;
      };
      compartmentId: string;
    };
  }): Promise<{ analyzeImageResult?: unknown }>;
}

export class TextDetector {
  constructor(
    private readonly client: VisionClient,
    private readonly compartmentId: string,
  ) {}

  /**
   * Runs text detection on an image already in Object Storage.
   * Remote failures and responses that do not match the expected shape are thrown.
   */
  async detect(image: StoredObjectRef): Promise<DetectedWord[]> {
    const startTime = Date.now();

    const response = await this.client.analyzeImage({
      analyzeImageDetails: {
        features: [{ featureType: 'TEXT_DETECTION' }],
        image: {
          source: 'OBJECT_STORAGE',
          namespaceName: image.namespace,
          bucketName: image.bucket,
          objectName: image.objectKey,
        },
        compartmentId: this.compartmentId,
      },
    });

    const result = analyzeImageResultSchema.parse(response.analyzeImageResult ?? {});
    const words = (result.imageText?.words ?? []).map((word): DetectedWord => {
      const [topLeft, , bottomRight] = word.boundingPolygon.normalizedVertices;
      return {
        text: word.text,
        confidence: word.confidence,
        boundingBox: {
          topLeft: { x: topLeft.x, y: topLeft.y },
          bottomRight: { x: bottomRight.x, y: bottomRight.y },
        },
      };
    });

    log.info({ objectKey: image.objectKey, wordCount: words.length, latencyMs: Date.now() - startTime }, 'Text detected');
    return words;
  }
}
