/**
 * Schema check runner
 *
 * `--help` is answered before configuration is loaded, so it works without a
 * DATABASE_URL.
 */

import { config } from "dotenv";
import { dirname, resolve } from "path";
import { fileURLToPath } from "url";
import { closeDb, getDb } from "@tradebook/db";
import { logger, parseLogLevel } from "@tradebook/utils";

import { parseArgs, usage } from "./cli";
import { runSchemaCheck } from "./usecases/check-schema";

/** `.env` at the repository root, whatever the working directory */
export const ROOT_ENV_PATH = resolve(dirname(fileURLToPath(import.meta.url)), "../../../.env");

/**
 * Run the CLI and return its exit code. Failures reject.
 */
export async function run(argv: string[]): Promise<number> {
  const args = parseArgs(argv);

  if (args.help) {
    console.log(usage());
    return 0;
  }

  config({ path: ROOT_ENV_PATH });
  // Validated on import: load only after .env
  const { env } = await import("./env");

  logger.setLevel(parseLogLevel(env.LOG_LEVEL));
  logger.info(`Starting schema check (dry-run: ${args.dryRun})`, { env: env.APP_ENV });

  const db = getDb(env.DATABASE_URL, { max: env.DB_POOL_MAX });
  try {
    const result = await runSchemaCheck(db, { dryRun: args.dryRun });
    if (result.isErr()) {
      throw new Error(result.error.message);
    }
  } finally {
    await closeDb(db);
  }
  return 0;
}
