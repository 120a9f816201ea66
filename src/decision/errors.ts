import type { RequiredField } from "./types.js";

/**
 * Raised when a user record is missing one or more required fields
 */
export class InvalidRecordError extends Error {
  readonly missingFields: readonly RequiredField[];

  constructor(missingFields: readonly RequiredField[]) {
    super(`User record is missing required fields: ${missingFields.join(", ")}`);
    this.name = "InvalidRecordError";
    this.missingFields = missingFields;
  }
}

/**
 * Prediction provider failure: thrown error or malformed prediction
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ProviderError";
  }
}

/**
 * Activity date that is not a real YYYY-MM-DD calendar date
 */
export class InvalidDateError extends Error {
  constructor(public readonly value: string) {
    super(`Invalid date format: ${value}, expected YYYY-MM-DD`);
    this.name = "InvalidDateError";
  }
}
