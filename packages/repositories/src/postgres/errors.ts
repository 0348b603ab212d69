/**
 * Postgres error mapping
 *
 * Constraint violations are recognised by SQLSTATE. Drivers and Drizzle may wrap
 * the engine error, so the `cause` chain is searched.
 */

import type { Result } from "neverthrow";
import { err, ok } from "neverthrow";

import type { IntegrityViolation, RepositoryError } from "../interfaces/errors";

const SQLSTATE_VIOLATIONS: Record<string, IntegrityViolation> = {
  "23502": "NOT_NULL",
  "23503": "FOREIGN_KEY",
  "23505": "UNIQUE",
  "23514": "CHECK",
};

const MAX_CAUSE_DEPTH = 5;

function findViolation(e: unknown): { violation: IntegrityViolation; message: string } | null {
  let current: unknown = e;
  for (let depth = 0; depth < MAX_CAUSE_DEPTH; depth++) {
    if (typeof current !== "object" || current === null) return null;

    if ("code" in current && typeof current.code === "string") {
      const violation = SQLSTATE_VIOLATIONS[current.code];
      if (violation) {
        return { violation, message: current instanceof Error ? current.message : violation };
      }
    }
    current = "cause" in current ? current.cause : undefined;
  }
  return null;
}

export function toRepositoryError(e: unknown): RepositoryError {
  const found = findViolation(e);
  if (found) {
    return { type: "INTEGRITY_ERROR", violation: found.violation, message: found.message };
  }
  return {
    type: "DB_ERROR",
    message: e instanceof Error ? e.message : "Unknown error",
  };
}

export function notFound(what: string): RepositoryError {
  return { type: "NOT_FOUND", message: `${what} not found` };
}

/**
 * First row of a `RETURNING` / lookup result, NOT_FOUND when there is none
 */
export function firstRow<T>(what: string): (rows: T[]) => Result<T, RepositoryError> {
  return rows => {
    const [row] = rows;
    return row ? ok(row) : err(notFound(what));
  };
}

/**
 * First row or null
 */
export function firstOrNull<T>(rows: T[]): T | null {
  return rows[0] ?? null;
}
