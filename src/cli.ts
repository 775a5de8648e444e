#!/usr/bin/env node
/**
 * Keep a Porkbun DNS record pointed at this machine's public IP.
 *
 * Usage:
 *   PORKBUN_API_KEY=xxx PORKBUN_SECRET_KEY=xxx PORKBUN_RECORD_ID=123 \
 *   PORKBUN_DOMAIN=example.com porkbun-ddns [--dry-run]
 *
 * Variables may also come from a `.env` file in the working directory.
 * Run it from cron or a systemd timer.
 */

import 'dotenv/config';
import { logger } from './logger.js';
import { run } from './run.js';

const args = process.argv.slice(2);

if (args.includes('--help') || args.includes('-h')) {
  console.log('Usage: porkbun-ddns [--dry-run]');
  process.exit(0);
}

run({ dryRun: args.includes('--dry-run') })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error(
      'unexpected failure',
      undefined,
      err instanceof Error ? err : new Error(String(err))
    );
    process.exitCode = 1;
  });
