import type { AnomalyVerdict, DetectedWord } from '../../domain/types.js';

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.9;

/** A word is anomalous when its confidence is strictly below the threshold. No words means clear. */
export function evaluateAnomalies(
  words: readonly DetectedWord[],
  threshold: number = DEFAULT_CONFIDENCE_THRESHOLD,
): AnomalyVerdict {
  const anomalousWords = words.filter((word) => word.confidence < threshold);
  return { clear: anomalousWords.length === 0, anomalousWords };
}
