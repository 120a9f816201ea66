import { REQUIRED_FIELDS, type RequiredField, type UserRecord, type UserRecordInput } from "./types.js";

/**
 * Required fields absent from the record, in declaration order.
 * A field set to `undefined` counts as absent; values are not type-checked.
 */
export function missingRequiredFields(record: UserRecordInput): RequiredField[] {
  return REQUIRED_FIELDS.filter((field) => record[field] === undefined);
}

/**
 * True when every required field is present (decision-eligible record)
 */
export function validateUserRecord(record: UserRecordInput): record is UserRecord {
  return missingRequiredFields(record).length === 0;
}
