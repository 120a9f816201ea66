/**
 * Decision Engine Types
 *
 * Shapes flowing through validation, prediction, policy and formatting.
 */

/**
 * Closed set of actions the engine can recommend
 */
export const ACTIONS = ["offer_discount", "recommend_product", "send_message"] as const;

export type Action = (typeof ACTIONS)[number];

/**
 * Per-user feature record, as loaded from the dataset
 */
export interface UserRecord {
  user_id: number;
  age: number;
  gender: string;
  /** ISO 8601 calendar date (YYYY-MM-DD) */
  last_active: string;
  interactions: number;
  purchases: number;
}

/**
 * A record that has not been validated yet; any field may be absent
 */
export type UserRecordInput = Readonly<Partial<UserRecord>>;

export const REQUIRED_FIELDS = [
  "user_id",
  "age",
  "gender",
  "last_active",
  "interactions",
  "purchases",
] as const satisfies ReadonlyArray<keyof UserRecord>;

export type RequiredField = (typeof REQUIRED_FIELDS)[number];

export interface Prediction {
  /** Engagement likelihood in [0, 1], two decimals */
  engagement_score: number;
  suggested_action: Action;
}

export interface Recommendation {
  readonly user_id: number;
  readonly action: Action;
  readonly engagement_score: number;
}
