import db from '../db/knex.js';
import { logger } from '../logger.js';

void (async () => {
  try {
    const [batch, files] = await db.migrate.rollback();
    logger.info({ batch, files }, 'migrations rolled back');
    await db.destroy();
    process.exit(0);
  } catch (err) {
    logger.error({ err }, 'rollback error');
    process.exit(1);
  }
})();
