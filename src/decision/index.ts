export { DecisionEngine } from "./engine.js";
export { MockPredictionProvider, type RandomSource } from "./mock-provider.js";
export type { PredictionProvider } from "./provider.js";
export { validateUserRecord, missingRequiredFields } from "./validator.js";
export { decideAction, ENGAGEMENT_THRESHOLD, FALLBACK_ACTION } from "./policy.js";
export { formatRecommendation, roundScore } from "./formatter.js";
export { parseActivityDate, daysSinceLastActive } from "./activity.js";
export { InvalidRecordError, ProviderError, InvalidDateError } from "./errors.js";
export {
  ACTIONS,
  REQUIRED_FIELDS,
  type Action,
  type Prediction,
  type Recommendation,
  type RequiredField,
  type UserRecord,
  type UserRecordInput,
} from "./types.js";
