import type { Knex } from "knex";
import { moduleLogger } from "../logger.js";

const log = moduleLogger("knex");

/** Route knex's own warnings (deprecations, unsupported locks) through pino. */
export const knexLog: Knex.Logger = {
  warn: (message: unknown) => log.warn({ message }, "knex warning"),
  error: (message: unknown) => log.error({ message }, "knex error"),
  deprecate: (method: string, alternative: string) =>
    log.warn({ method, alternative }, "knex deprecation"),
  debug: (message: unknown) => log.debug({ message }, "knex debug"),
};
