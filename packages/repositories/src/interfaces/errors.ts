/**
 * Repository Errors
 *
 * Shared by every repository. Integrity errors are the engine's constraint
 * violations (FK, NOT NULL, primary key / unique), passed through unchanged.
 */

export type IntegrityViolation = "FOREIGN_KEY" | "NOT_NULL" | "UNIQUE" | "CHECK";

export type RepositoryError =
  | { type: "DB_ERROR"; message: string }
  | { type: "NOT_FOUND"; message: string }
  | { type: "INTEGRITY_ERROR"; violation: IntegrityViolation; message: string }
  | { type: "DECODE_ERROR"; message: string }
  | { type: "INVALID_INPUT"; message: string };

/**
 * Time range filter, both bounds inclusive
 */
export interface TimeRange {
  from?: Date;
  to?: Date;
}
