/**
 * Personalization Decision Engine
 *
 * validate → predict → decide → format, once per record. Errors are thrown
 * to the caller; the engine neither logs nor retries.
 */

import { InvalidRecordError, ProviderError } from "./errors.js";
import { formatRecommendation, roundScore } from "./formatter.js";
import { decideAction } from "./policy.js";
import type { PredictionProvider } from "./provider.js";
import { PredictionSchema } from "../schemas/recommendation.js";
import type { Prediction, Recommendation, UserRecord, UserRecordInput } from "./types.js";
import { missingRequiredFields, validateUserRecord } from "./validator.js";

export class DecisionEngine {
  constructor(private readonly provider: PredictionProvider) {}

  get providerName(): string {
    return this.provider.name;
  }

  /**
   * @throws InvalidRecordError when a required field is missing
   * @throws ProviderError when the provider throws or returns a malformed prediction
   */
  recommend(record: UserRecordInput): Recommendation {
    if (!validateUserRecord(record)) {
      throw new InvalidRecordError(missingRequiredFields(record));
    }

    const prediction = this.predict(record);
    // Threshold applies to the reported two-decimal score
    const score = roundScore(prediction.engagement_score);
    const action = decideAction({ ...prediction, engagement_score: score });
    return formatRecommendation(record.user_id, action, score);
  }

  private predict(record: UserRecord): Prediction {
    let prediction: Prediction;
    try {
      prediction = this.provider.predict(record);
    } catch (error) {
      if (error instanceof ProviderError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ProviderError(`Prediction failed: ${message}`, this.provider.name, { cause: error });
    }

    assertWellFormed(prediction, this.provider.name);
    return prediction;
  }
}

/**
 * Providers are external code; check the two-field contract at runtime.
 */
function assertWellFormed(prediction: unknown, provider: string): void {
  const result = PredictionSchema.safeParse(prediction);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "prediction"}: ${issue.message}`)
      .join("; ");
    throw new ProviderError(`Malformed prediction: ${issues}`, provider, { cause: result.error });
  }
}
