/**
 * Schema Check Main Entry Point
 *
 * Usage:
 *   npm run db:check
 *   npm run db:check -- --dry-run
 */

import { logger } from "@tradebook/utils";

import { run } from "./app";

run(process.argv.slice(2))
  .then(code => process.exit(code))
  .catch(error => {
    logger.error("Fatal error", error);
    process.exit(1);
  });
