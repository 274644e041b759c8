/**
 * Floor for model registration and for the authenticity score an asset may carry
 * out of a transfer. One threshold serves both checks.
 */
export const MIN_CONFIDENCE = 70;

export const MAX_SCORE = 100;

const MODEL_WEIGHT = 60;
const HISTORY_WEIGHT = 40;

export function isValidScore(score: number): boolean {
  return Number.isInteger(score) && score >= 0 && score <= MAX_SCORE;
}

export function isValidConfidence(confidence: number): boolean {
  return isValidScore(confidence) && confidence >= MIN_CONFIDENCE;
}

/**
 * Weighted authenticity recalculation applied at every transfer:
 * `floor((confidence * 60 + score * 40) / 100)`.
 */
export function recalculateScore(modelConfidence: number, currentScore: number): number {
  return Math.floor((modelConfidence * MODEL_WEIGHT + currentScore * HISTORY_WEIGHT) / 100);
}

export function passesFraudThreshold(score: number): boolean {
  return score >= MIN_CONFIDENCE;
}
