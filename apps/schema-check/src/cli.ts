/**
 * Command line options
 */

export interface Opts {
  dryRun: boolean;
  help: boolean;
}

export function usage(): string {
  return `
Usage: schema-check [options]

Creates missing tables and adds missing columns. Existing data is never dropped.

Options:
  --dry-run     Print what would change without writing to the database
  --help, -h    Show this help message

Environment variables:
  DATABASE_URL  PostgreSQL connection string
  DB_POOL_MAX   Pool size (default 10)
  LOG_LEVEL     ERROR | WARN | LOG | INFO | DEBUG (default INFO)
`.trim();
}

export function parseArgs(argv: string[]): Opts {
  const opts: Opts = {
    dryRun: false,
    help: false,
  };

  for (const arg of argv) {
    if (arg === "--help" || arg === "-h") opts.help = true;
    if (arg === "--dry-run") opts.dryRun = true;
  }

  return opts;
}
