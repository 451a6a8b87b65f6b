// One-off timeout sweep, for running from cron instead of the in-process reaper:
//   */5 * * * * cd /srv/cbt-exam/apps/api && npm run sweep-timeouts

import { buildContainer } from '../container';
import { createDatabase } from '../db/client';
import { loadConfig, loadEnvFile } from '../lib/config';
import { sweepTimedOutSessions } from '../modules/sessions/session.reaper';

async function main(): Promise<void> {
  loadEnvFile();
  const config = loadConfig();
  if (!config.services.includes('sessions')) {
    throw new Error('SERVICES must include sessions to sweep timed-out sessions');
  }

  const { db, pool } = createDatabase(config.databaseUrl);
  try {
    const { sweep } = buildContainer(config, db);
    if (!sweep) {
      throw new Error('sessions service could not be built: no exam authority configured');
    }
    const report = await sweepTimedOutSessions(sweep);
    console.log(
      `[reaper] done: checked=${report.checked} timedOut=${report.timedOut.length} failed=${report.failed}`
    );
  } finally {
    await pool.end();
  }
}

main().catch((err: unknown) => {
  console.error('[reaper] sweep failed', err);
  process.exit(1);
});
