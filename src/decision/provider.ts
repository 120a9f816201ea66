import type { Prediction, UserRecord } from "./types.js";

/**
 * Source of engagement predictions.
 *
 * Implementations return a well-formed Prediction or throw. The engine calls
 * `predict` exactly once per recommendation and never retries; retry policy,
 * if any, belongs to the implementation.
 */
export interface PredictionProvider {
  readonly name: string;
  predict(record: Readonly<UserRecord>): Prediction;
}
