#!/usr/bin/env tsx
/**
 * Clinigraph sync CLI
 *
 * Usage:
 *   npm run sync                          # full ordered load
 *   npm run sync -- --only=Provider,Patient
 *   npm run sync -- health                # connectivity + constraints
 *
 * Exit Codes:
 *   0 - every entity type loaded or was skipped / both stores reachable
 *   1 - configuration error, connection failure or a failed entity type
 */

import { ENTITY_LOAD_ORDER } from '@clinigraph/types';

import { parseArgs } from './cli-args.js';
import { runHealthCheck } from './health-check.js';
import { EXIT_FAILURE, runSyncJob } from './sync-job.js';

function printHelp(): void {
  console.log(`
Clinigraph sync

Usage:
  npm run sync -- [sync|health] [options]

Options:
  --only=<types>   Comma-separated entity types to load (${ENTITY_LOAD_ORDER.join(', ')})
  -h, --help       Show this help message

Environment Variables:
  SOURCE_DRIVER          snowflake (default) or postgres
  SNOWFLAKE_*            account, user, password, warehouse, database, schema, role
  SOURCE_DATABASE_URL    Postgres connection string
  SOURCE_PASSCODE        MFA passcode; prompted for when unset
  NEO4J_URI, NEO4J_USER, NEO4J_PASSWORD, NEO4J_DATABASE
  MAX_ROWS_PER_ENTITY    Row cap per entity type (default: 7000)
`);
}

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2));
  if (typeof parsed === 'string') {
    console.error(parsed);
    return EXIT_FAILURE;
  }

  switch (parsed.command) {
    case 'help':
      printHelp();
      return 0;
    case 'health':
      return runHealthCheck();
    case 'sync':
      return runSyncJob({}, { entityTypes: parsed.entityTypes });
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = EXIT_FAILURE;
  });
