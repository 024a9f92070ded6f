/**
 * Fill journal entries for a date range
 *
 * Logs in, opens the journal form and files one entry per day, using the
 * same content and category for every day.
 *
 * Usage:
 *   npx tsx --env-file=.env src/scripts/fill-journal.ts -- --start=2024-03-01 --end=2024-03-07 --category=<id> --content="<text>"
 *
 * Flags:
 *   --start=<YYYY-MM-DD>   (required) First day
 *   --end=<YYYY-MM-DD>     (optional) Last day, default: same as --start
 *   --category=<id>        (required) Category option value on the form
 *   --content=<text>       (required) Entry text
 *   --delay=<seconds>      (optional) Pause between entries, default DAYLOG_DELAY_SECONDS
 *   --url=<url>            (optional) Login page, default DAYLOG_URL
 *   --account=<id>         (optional) Account, default DAYLOG_ACCOUNT_ID
 *
 * The secret is read from DAYLOG_SECRET only. Ctrl-C stops after the
 * current day.
 */

import { getEnv } from '../config/env';
import { BatchRequestSchema } from '../config/request';
import { startBatch } from '../engine/BatchDriver';
import { createBatchDriver } from '../runner';
import { getLogger } from '../monitoring/logger';
import { errorMessage } from '../engine/errors';
import { requestFromArgs } from './args';

async function main(): Promise<number> {
  const env = getEnv();
  const logger = getLogger().child({ component: 'cli' });

  const parsed = BatchRequestSchema.safeParse(requestFromArgs(process.argv, env));
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      console.error(`  --${issue.path.join('.')}: ${issue.message}`);
    }
    return 2;
  }
  const request = parsed.data;

  const driver = createBatchDriver();
  const handle = startBatch(driver, {
    request,
    onProgress: (processed, total, succeeded, failed) => {
      console.log(`[${processed}/${total}] ok=${succeeded} failed=${failed}`);
    },
  });

  process.once('SIGINT', () => {
    logger.info('Stop requested, finishing the current day');
    handle.cancel();
  });

  const result = await handle.done;

  console.log('='.repeat(50));
  console.log(`Total:     ${result.total}`);
  console.log(`Processed: ${result.processed}`);
  console.log(`Succeeded: ${result.succeeded}`);
  console.log(`Failed:    ${result.failed}`);
  console.log(`State:     ${result.state}`);
  for (const day of result.details) {
    const status = day.outcome.kind === 'explicit_failure' ? `FAILED (${day.outcome.reason})` : day.outcome.kind;
    console.log(`  ${day.date}  ${status}`);
  }

  return result.failed === 0 && result.state === 'completed' ? 0 : 1;
}

main().then(
  (code) => process.exit(code),
  (err) => {
    console.error(`Fatal: ${errorMessage(err)}`);
    process.exit(1);
  },
);
