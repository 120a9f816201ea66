import type { Action, Recommendation } from "./types.js";

/**
 * Round to two decimal places
 */
export function roundScore(score: number): number {
  return Math.round(score * 100) / 100;
}

/**
 * Assemble the canonical recommendation record. Inputs are assumed valid.
 */
export function formatRecommendation(userId: number, action: Action, score: number): Recommendation {
  return Object.freeze({
    user_id: userId,
    action,
    engagement_score: roundScore(score),
  });
}
