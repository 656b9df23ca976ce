// src/server.ts
import { createServer } from "http";
import { env, assertCriticalEnv } from "./config.js";
import { logger } from "./logger.js";
import { db } from "./db/knex.js";
import { azampayFromEnv } from "./psp/azampay.js";
import { createApp } from "./app.js";

assertCriticalEnv(["DATABASE_URL", "API_ACCESS_KEY", "AZAMPAY_CLIENT_ID", "GATEWAY_WEBHOOK_SECRET"]);

const app = createApp({ db, gateway: azampayFromEnv() });
const httpServer = createServer(app);

httpServer.listen(env.PORT, () => {
  logger.info({ port: env.PORT }, "API listening");
});

function shutdown(signal: string) {
  logger.info({ signal }, "shutting down");
  httpServer.close(() => {
    db.destroy()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, "failed to close database pool");
        process.exit(1);
      });
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
