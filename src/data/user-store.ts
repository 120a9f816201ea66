/**
 * User dataset
 *
 * Loaded once at startup from CSV into a read-only lookup keyed by user_id.
 * Records are stored as parsed; validation is the decision engine's job, so a
 * row with an empty cell is kept with that field absent.
 */

import { readFile } from "node:fs/promises";
import Papa from "papaparse";
import type { UserRecord, UserRecordInput } from "../decision/types.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";

const INTEGER_COLUMNS = ["user_id", "age", "interactions", "purchases"] as const;
const STRING_COLUMNS = ["gender", "last_active"] as const;

type CsvRow = Record<string, string | undefined>;

type MutableUserRecord = { -readonly [K in keyof UserRecord]?: UserRecord[K] };

export interface ParsedUsers {
  users: Map<number, UserRecordInput>;
  /** Rows dropped because user_id was missing or not a positive integer */
  skipped: number;
  /** Rows whose user_id repeated an earlier row (last one wins) */
  duplicates: number;
  /** CSV-level problems reported by the parser, e.g. too few or too many fields */
  parseErrors: number;
}

const INTEGER_CELL = /^-?\d+$/;

/**
 * Plain base-10 integers only; hex, exponent and fractional text are absent
 */
function parseIntegerCell(cell: string | undefined): number | undefined {
  const trimmed = cell?.trim();
  if (trimmed === undefined || !INTEGER_CELL.test(trimmed)) {
    return undefined;
  }
  const value = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(value) ? value : undefined;
}

function parseStringCell(cell: string | undefined): string | undefined {
  if (cell === undefined) {
    return undefined;
  }
  const trimmed = cell.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function rowToRecord(row: CsvRow): MutableUserRecord {
  const record: MutableUserRecord = {};
  for (const column of INTEGER_COLUMNS) {
    const value = parseIntegerCell(row[column]);
    if (value !== undefined) {
      record[column] = value;
    }
  }
  for (const column of STRING_COLUMNS) {
    const value = parseStringCell(row[column]);
    if (value !== undefined) {
      record[column] = value;
    }
  }
  return record;
}

/**
 * Parse CSV text (header row required) into user records keyed by user_id
 */
export function parseUserCsv(text: string): ParsedUsers {
  const parsed = Papa.parse<CsvRow>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  const users = new Map<number, UserRecordInput>();
  let skipped = 0;
  let duplicates = 0;

  for (const row of parsed.data) {
    const record = rowToRecord(row);
    const userId = record.user_id;
    if (userId === undefined || !Number.isSafeInteger(userId) || userId <= 0) {
      skipped += 1;
      continue;
    }
    if (users.has(userId)) {
      duplicates += 1;
    }
    users.set(userId, Object.freeze(record));
  }

  return { users, skipped, duplicates, parseErrors: parsed.errors.length };
}

/**
 * Read-only user lookup
 */
export class UserStore {
  private readonly users: ReadonlyMap<number, UserRecordInput>;

  constructor(records: Iterable<UserRecordInput>) {
    const users = new Map<number, UserRecordInput>();
    for (const record of records) {
      if (record.user_id !== undefined) {
        users.set(record.user_id, Object.freeze({ ...record }));
      }
    }
    this.users = users;
  }

  static fromCsv(text: string): UserStore {
    return new UserStore(parseUserCsv(text).users.values());
  }

  get size(): number {
    return this.users.size;
  }

  get(userId: number): UserRecordInput | undefined {
    return this.users.get(userId);
  }

  has(userId: number): boolean {
    return this.users.has(userId);
  }
}

/**
 * Load the dataset from disk. Throws if the file cannot be read.
 */
export async function loadUserStore(path: string): Promise<UserStore> {
  const text = await readFile(path, "utf-8");
  const { users, skipped, duplicates, parseErrors } = parseUserCsv(text);

  if (skipped > 0 || duplicates > 0 || parseErrors > 0) {
    log.warn(
      { path, skipped, duplicates, parse_errors: parseErrors },
      "User dataset contained malformed, skipped or overwritten rows",
    );
  }

  const store = new UserStore(users.values());
  emit(TelemetryEvents.DatasetLoaded, { path, users: store.size, skipped, duplicates, parse_errors: parseErrors });
  return store;
}
