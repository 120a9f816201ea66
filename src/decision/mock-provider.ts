import type { PredictionProvider } from "./provider.js";
import { ACTIONS, type Action, type Prediction, type UserRecord } from "./types.js";
import { roundScore } from "./formatter.js";

/** Returns a float in [0, 1) */
export type RandomSource = () => number;

/**
 * Stand-in for a real engagement model.
 *
 * Ignores every field of the record: the score is uniform in [0, 1] and the
 * suggested action uniform over ACTIONS. Each call is an independent draw.
 */
export class MockPredictionProvider implements PredictionProvider {
  readonly name = "mock";

  constructor(private readonly random: RandomSource = Math.random) {}

  predict(_record: Readonly<UserRecord>): Prediction {
    return {
      engagement_score: roundScore(this.random()),
      suggested_action: this.pickAction(),
    };
  }

  private pickAction(): Action {
    const index = Math.min(Math.floor(this.random() * ACTIONS.length), ACTIONS.length - 1);
    return ACTIONS[index];
  }
}
