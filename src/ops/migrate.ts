import db from '../db/knex.js';
import { logger } from '../logger.js';

void (async () => {
  try {
    const [batch, files] = await db.migrate.latest();
    logger.info({ batch, files }, 'migrations applied');
    await db.destroy();
    process.exit(0);
  } catch (err) {
    logger.error({ err }, 'migration error');
    process.exit(1);
  }
})();
