import type { Action, Prediction } from "./types.js";

/**
 * Scores must be strictly above this to use the suggested action.
 * A score of exactly 0.7 falls back.
 */
export const ENGAGEMENT_THRESHOLD = 0.7;

export const FALLBACK_ACTION: Action = "send_message";

export function decideAction(prediction: Prediction): Action {
  return prediction.engagement_score > ENGAGEMENT_THRESHOLD
    ? prediction.suggested_action
    : FALLBACK_ACTION;
}
