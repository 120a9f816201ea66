import { z } from "zod";
import { ACTIONS } from "../decision/types.js";

export const ActionSchema = z.enum(ACTIONS);

/**
 * Prediction contract every provider must honour
 */
export const PredictionSchema = z.object({
  engagement_score: z.number().finite().min(0).max(1),
  suggested_action: ActionSchema,
});

export const RecommendationSchema = z.object({
  user_id: z.number().int(),
  action: ActionSchema,
  engagement_score: z.number().min(0).max(1),
});

/**
 * Path params for GET /recommend/:user_id
 */
export const RecommendParams = z.object({
  user_id: z
    .string()
    .regex(/^\d+$/, "user_id must be a positive integer")
    .transform((val) => Number(val))
    .pipe(z.number().int().positive().max(Number.MAX_SAFE_INTEGER)),
});
